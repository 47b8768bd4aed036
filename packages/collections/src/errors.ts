/**
 * Collection error codes and the context-specific invariant error.
 */

import { InvariantError } from "@atrium/core";

export const CollectionErrorCodes = {
  /** Record id not in the collection */
  NOT_FOUND: "NOT_FOUND",
  /** Record does not belong to this owner */
  NOT_OWNED: "NOT_OWNED",
  /** Reorder list names a stranger or repeats an id */
  INVALID_ORDER: "INVALID_ORDER",
  /** Asset failed upload validation */
  UPLOAD_REJECTED: "UPLOAD_REJECTED",
  /** Owner kind does not accept the asset's media kind */
  MEDIA_KIND_NOT_ALLOWED: "MEDIA_KIND_NOT_ALLOWED",
  /** Attach would exceed the owner kind's limit */
  COLLECTION_FULL: "COLLECTION_FULL",
  /** More than one primary, or none in a non-empty collection */
  SINGLE_PRIMARY_VIOLATED: "SINGLE_PRIMARY_VIOLATED",
  /** Two members share an assigned id */
  DUPLICATE_RECORD: "DUPLICATE_RECORD",
  /** FileStore.store failed; bytes written in the call were rolled back */
  STORAGE_FAILURE: "STORAGE_FAILURE",
  /** save/deleteOwner failed; bytes written in the call were rolled back */
  PERSISTENCE_FAILURE: "PERSISTENCE_FAILURE",
  /** Owner version is stale */
  VERSION_CONFLICT: "VERSION_CONFLICT",
  /** Bytes could not be deleted after a durable detach or purge */
  CLEANUP_WARNING: "CLEANUP_WARNING",
} as const;

export type CollectionErrorCode = (typeof CollectionErrorCodes)[keyof typeof CollectionErrorCodes];

export type RejectionCode =
  | typeof CollectionErrorCodes.NOT_FOUND
  | typeof CollectionErrorCodes.NOT_OWNED
  | typeof CollectionErrorCodes.INVALID_ORDER
  | typeof CollectionErrorCodes.UPLOAD_REJECTED
  | typeof CollectionErrorCodes.MEDIA_KIND_NOT_ALLOWED
  | typeof CollectionErrorCodes.COLLECTION_FULL;

export type FailureCode =
  | typeof CollectionErrorCodes.STORAGE_FAILURE
  | typeof CollectionErrorCodes.PERSISTENCE_FAILURE
  | typeof CollectionErrorCodes.VERSION_CONFLICT;

/**
 * Invariant error for the Collection context.
 *
 * @example
 * ```typescript
 * throw new CollectionInvariantError("NOT_OWNED", "Attachment is not a member of this collection", {
 *   recordId,
 * });
 * ```
 */
export const CollectionInvariantError = InvariantError.forContext<CollectionErrorCode>("Collection");
export type CollectionInvariantError = InvariantError<CollectionErrorCode>;
