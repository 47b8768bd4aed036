export type { BaseDocument, DocumentLoadResult } from "./types.js";
export {
  createUpcaster,
  getStateVersion,
  DocumentUpcasterError,
  type DocumentMigration,
  type DocumentUpcastConfig,
  type DocumentUpcasterErrorCode,
} from "./upcaster.js";
