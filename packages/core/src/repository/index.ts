export { NotFoundError, VersionConflictError } from "./errors.js";
