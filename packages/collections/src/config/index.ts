export {
  loadCollectionsConfig,
  defaultCollectionsConfig,
  ConfigurationError,
  CollectionsEnvSchema,
  DEFAULT_IMAGE_TYPES,
  DEFAULT_VIDEO_TYPES,
  DEFAULT_MAX_IMAGE_SIZE,
  DEFAULT_MAX_VIDEO_SIZE,
  DEFAULT_MAX_FILES_PER_ITEM,
  type CollectionsConfig,
} from "./config.js";
