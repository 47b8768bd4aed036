export {
  UploadPolicy,
  AssetInputSchema,
  MAX_FILE_NAME_LENGTH,
  PHOTO_GALLERY_MAX_ATTACHMENTS,
  SVG_CONTENT_TYPE,
  type CollectionRules,
  type PolicyCheck,
  type PolicyViolation,
  type ValidatedAsset,
} from "./uploadPolicy.js";
