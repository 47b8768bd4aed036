/**
 * @atrium/collections
 *
 * Ordered, owned attachment collections: one primary per non-empty
 * collection, transactional attach/detach/promote/reorder/purge over a
 * `FileStore` and a `PersistenceGateway`.
 *
 * @example
 * ```typescript
 * import { CollectionMutator, LocalDiskFileStore, UploadPolicy, loadCollectionsConfig } from "@atrium/collections";
 *
 * const config = loadCollectionsConfig();
 * const mutator = new CollectionMutator({
 *   fileStore: new LocalDiskFileStore({ uploadDir: config.uploadDir }),
 *   gateway,
 *   policy: new UploadPolicy(config),
 * });
 * ```
 */

// Types
export type {
  AttachmentRecord,
  AssetInput,
  FileStore,
  MediaKind,
  Owner,
  OwnerKind,
  PersistenceGateway,
} from "./types.js";
export { MEDIA_KINDS, OWNER_KINDS, OWNER_STATE_VERSION } from "./types.js";

// Errors
export {
  CollectionErrorCodes,
  CollectionInvariantError,
  type CollectionErrorCode,
  type FailureCode,
  type RejectionCode,
} from "./errors.js";

export * from "./record/index.js";
export * from "./lifecycle/index.js";
export * from "./invariants/index.js";
export * from "./collection/index.js";
export * from "./config/index.js";
export * from "./policy/index.js";
export * from "./legacy/index.js";
export * from "./storage/index.js";
export * from "./mutator/index.js";
