/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout @atrium/core.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for log data, error context and any object whose structure is unknown
 * at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * @throws Error if reached at runtime (indicates a missing case)
 *
 * @example
 * ```typescript
 * switch (result.status) {
 *   case "success":
 *     return result.data;
 *   case "rejected":
 *   case "failed":
 *     return null;
 *   default:
 *     return assertNever(result);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
