import type { BaseDocument, DocumentLoadResult } from "./types.js";
import type { UnknownRecord } from "../types.js";

export type DocumentUpcasterErrorCode =
  | "NULL_STATE"
  | "MISSING_MIGRATION"
  | "INVALID_STATE"
  | "FUTURE_VERSION";

/**
 * Migration function from one state version to the next.
 */
export type DocumentMigration = (state: unknown) => unknown;

export interface DocumentUpcastConfig<TLatest extends BaseDocument> {
  /** Current (latest) state version for this document type */
  currentVersion: number;

  /**
   * Migration functions keyed by source version.
   * Each migrates from version N to N+1.
   *
   * For currentVersion = 3, migrations are needed for versions 1 and 2.
   * Documents stored without any `stateVersion` are treated as version 0
   * and need `migrations[0]`.
   */
  migrations: Record<number, DocumentMigration>;

  /** Type guard for the final, upcasted document */
  validate: (state: unknown) => state is TLatest;
}

export class DocumentUpcasterError extends Error {
  readonly code: DocumentUpcasterErrorCode;
  readonly context: UnknownRecord | undefined;

  constructor(code: DocumentUpcasterErrorCode, message: string, context?: UnknownRecord) {
    super(message);
    this.name = "DocumentUpcasterError";
    this.code = code;
    this.context = context;
  }
}

/**
 * Returns 0 if stateVersion is not present or not a number.
 */
export function getStateVersion(state: unknown): number {
  if (
    state !== null &&
    typeof state === "object" &&
    "stateVersion" in state &&
    typeof state.stateVersion === "number"
  ) {
    return state.stateVersion;
  }
  return 0;
}

/**
 * Create an upcaster chain for document schema evolution.
 *
 * Migrations are applied in order from the stored version up to
 * `currentVersion`; the result must pass `validate`.
 *
 * @example
 * ```typescript
 * const upcastOwner = createUpcaster<Owner>({
 *   currentVersion: 2,
 *   migrations: {
 *     1: migrateLegacyOwner,
 *   },
 *   validate: isOwner,
 * });
 *
 * const { document, wasUpcasted } = upcastOwner(raw);
 * ```
 *
 * @throws Error at creation time if a migration between the first declared
 * version and `currentVersion` is missing
 */
export function createUpcaster<T extends BaseDocument>(
  config: DocumentUpcastConfig<T>
): (rawState: unknown) => DocumentLoadResult<T> {
  const declared = Object.keys(config.migrations).map(Number);
  const lowest = declared.length > 0 ? Math.min(...declared) : config.currentVersion;
  for (let v = lowest; v < config.currentVersion; v++) {
    if (!config.migrations[v]) {
      throw new Error(
        `Missing migration for version ${v}. Migrations must form a complete chain from ${lowest} to ${config.currentVersion - 1}.`
      );
    }
  }

  return (rawState: unknown): DocumentLoadResult<T> => {
    if (rawState === null || rawState === undefined) {
      throw new DocumentUpcasterError("NULL_STATE", "Cannot upcast null or undefined state");
    }

    const originalStateVersion = getStateVersion(rawState);

    if (originalStateVersion === config.currentVersion) {
      if (!config.validate(rawState)) {
        throw new DocumentUpcasterError(
          "INVALID_STATE",
          `Document claims version ${config.currentVersion} but fails validation`
        );
      }
      return {
        document: rawState,
        wasUpcasted: false,
        originalStateVersion,
      };
    }

    if (originalStateVersion > config.currentVersion) {
      throw new DocumentUpcasterError(
        "FUTURE_VERSION",
        `State version ${originalStateVersion} is newer than current schema version ${config.currentVersion}. Cannot downcast.`,
        { stateVersion: originalStateVersion, currentVersion: config.currentVersion }
      );
    }

    let currentState: unknown = rawState;
    let currentVersion = originalStateVersion;

    while (currentVersion < config.currentVersion) {
      const migration = config.migrations[currentVersion];
      if (!migration) {
        throw new DocumentUpcasterError(
          "MISSING_MIGRATION",
          `No migration defined from version ${currentVersion} to ${currentVersion + 1}`,
          { fromVersion: currentVersion, toVersion: currentVersion + 1 }
        );
      }

      currentState = migration(currentState);
      currentVersion++;
    }

    const upcasted = currentState;
    if (!config.validate(upcasted)) {
      throw new DocumentUpcasterError("INVALID_STATE", "Upcasted document failed validation", {
        resultVersion: currentVersion,
      });
    }

    return {
      document: upcasted,
      wasUpcasted: true,
      originalStateVersion,
    };
  };
}
