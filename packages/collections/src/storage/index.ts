export {
  LocalDiskFileStore,
  PathOutsideUploadDirError,
  extensionOf,
  type LocalDiskFileStoreOptions,
} from "./LocalDiskFileStore.js";
