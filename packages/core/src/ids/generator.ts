/**
 * UUID v7 and prefixed ID generation utilities.
 *
 * ID Format: {context}_{type}_{uuidv7}
 * Example: collections_attachment_0190a7c4-1234-7abc-8def-1234567890ab
 *
 * Uses the `uuid` package for RFC 9562 compliant UUID v7 generation.
 */
import { v7 as uuidv7 } from "uuid";

export { uuidv7 };

/**
 * Lowercase alphanumeric only, since underscores delimit the parts.
 */
const VALID_ID_PART = /^[a-z0-9]+$/;

const MAX_ID_PART_LENGTH = 64;

/**
 * @throws Error if the part contains invalid characters or exceeds max length
 */
function validateIdPart(part: string, name: string): void {
  if (!part) {
    throw new Error(`${name} cannot be empty`);
  }
  if (!VALID_ID_PART.test(part)) {
    throw new Error(
      `Invalid ${name}: "${part}". Must contain only lowercase letters and numbers (no underscores, spaces, or special characters).`
    );
  }
  if (part.length > MAX_ID_PART_LENGTH) {
    throw new Error(
      `${name} too long: "${part}" (${part.length} chars). Maximum is ${MAX_ID_PART_LENGTH}.`
    );
  }
}

/**
 * Generate a prefixed ID in the format: {context}_{type}_{uuidv7}
 *
 * @param context - The bounded context (e.g., "collections")
 * @param type - The entity type (e.g., "attachment")
 * @throws Error if context or type contains invalid characters
 *
 * @example
 * ```typescript
 * generateId("collections", "attachment"); // "collections_attachment_0190a7c4-1234-7abc-..."
 * generateId("gallery_items", "photo");    // throws Error (underscore not allowed)
 * ```
 */
export function generateId(context: string, type: string): string {
  validateIdPart(context, "context");
  validateIdPart(type, "type");
  return `${context}_${type}_${uuidv7()}`;
}
