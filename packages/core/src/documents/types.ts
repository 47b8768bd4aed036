/**
 * ## Versioned Documents
 *
 * Core types for persisted aggregate documents that carry both a schema
 * version (for lazy migration on load) and a concurrency version (for
 * optimistic concurrency control on save).
 *
 * ### When to Use
 *
 * - Defining persisted aggregate shapes (extend BaseDocument)
 * - Schema evolution with `createUpcaster`
 * - Loading documents with potential upcasting (use DocumentLoadResult)
 */

export interface BaseDocument {
  /**
   * Schema version for lazy migration.
   * Increment this when the document structure changes.
   */
  stateVersion: number;

  /**
   * Concurrency version, incremented on every successful save.
   */
  version: number;
}

/**
 * Result of loading and potentially upcasting a document.
 */
export interface DocumentLoadResult<T extends BaseDocument> {
  /** The (potentially upcasted) document */
  document: T;

  wasUpcasted: boolean;

  /** State version before upcast (0 when the stored shape had none) */
  originalStateVersion: number;
}
