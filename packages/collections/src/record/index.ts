export {
  sameRecord,
  mediaKindFromContentType,
  isMediaKind,
  isOwnerKind,
  copyRecord,
  sortBySortKey,
} from "./record.js";
