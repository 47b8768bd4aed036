/**
 * Mutation results returned by `CollectionMutator`.
 *
 * Expected failures travel as values; only programmer errors are thrown.
 */

import type { Logger, OperationFailed, OperationRejected, OperationSuccess } from "@atrium/core";
import type { AttachmentRecord, FileStore, Owner, PersistenceGateway } from "../types.js";
import type { CollectionErrorCodes, FailureCode, RejectionCode } from "../errors.js";
import type { UploadPolicy } from "../policy/index.js";

/**
 * Bytes that could not be deleted after a durable detach or purge.
 */
export interface CleanupWarning {
  code: typeof CollectionErrorCodes.CLEANUP_WARNING;
  message: string;
  storedPath: string;
  recordId?: string;
}

export interface MutationSuccess<TData> extends OperationSuccess<TData> {
  warnings: CleanupWarning[];
}

export type MutationResult<TData> =
  | MutationSuccess<TData>
  | OperationRejected<RejectionCode>
  | OperationFailed<FailureCode>;

export interface AttachData {
  owner: Owner;
  /** The new records as saved, ids assigned */
  attached: AttachmentRecord[];
}

export interface DetachData {
  owner: Owner;
  detached: AttachmentRecord;
}

export interface PromoteData {
  owner: Owner;
  primary: AttachmentRecord;
}

export interface ReorderData {
  owner: Owner;
}

export interface PurgeData {
  /** The emptied owner, or null when the owner itself was deleted */
  owner: Owner | null;
  purged: AttachmentRecord[];
}

export interface PurgeOptions {
  /** Delete the owner (cascading its rows) instead of saving it empty */
  deleteOwner?: boolean;
}

export interface CollectionMutatorOptions {
  fileStore: FileStore;
  gateway: PersistenceGateway;
  /** Defaults to the policy built from default configuration */
  policy?: UploadPolicy;
  /** Defaults to a no-op logger */
  logger?: Logger;
  /** Source of `createdAt` timestamps; defaults to `Date.now` */
  clock?: () => number;
}
