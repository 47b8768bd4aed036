export { generateId, uuidv7 } from "./generator.js";
