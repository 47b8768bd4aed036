export { CollectionMutator } from "./CollectionMutator.js";
export {
  createCollectionMutator,
  MUTATOR_LOG_SCOPE,
  type CreateCollectionMutatorOptions,
} from "./createCollectionMutator.js";
export type {
  AttachData,
  CleanupWarning,
  CollectionMutatorOptions,
  DetachData,
  MutationResult,
  MutationSuccess,
  PromoteData,
  PurgeData,
  PurgeOptions,
  ReorderData,
} from "./types.js";
