export {
  hasSinglePrimary,
  recordIdsAreUnique,
  collectionInvariants,
  collectionHasRoom,
  mediaKindAllowed,
} from "./collectionInvariants.js";
