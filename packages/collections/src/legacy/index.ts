export {
  upcastOwner,
  migrateLegacyOwner,
  isOwner,
  OwnerSchema,
  LegacyOwnerSchema,
  type LegacyOwner,
} from "./ownerUpcaster.js";
