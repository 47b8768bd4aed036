import type { UnknownRecord } from "../types.js";

/**
 * Base invariant error class for domain rule violations.
 *
 * Each bounded context derives its own typed error class through
 * `forContext()`, sharing structure and type guards with every other context.
 *
 * @example
 * ```typescript
 * const CollectionInvariantError = InvariantError.forContext<CollectionErrorCode>("Collection");
 *
 * throw new CollectionInvariantError("NOT_OWNED", "Attachment does not belong to owner", {
 *   ownerId,
 *   recordId,
 * });
 * ```
 */
export class InvariantError<TCode extends string = string> extends Error {
  /**
   * Error code for programmatic handling.
   */
  public readonly code: TCode;

  /**
   * Entity ids, state values and the like for debugging and error reporting.
   */
  declare readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "InvariantError";
  }

  /**
   * Factory for creating context-specific error subclasses.
   *
   * @param contextName - Name of the bounded context (e.g., "Collection")
   * @returns A constructor whose instances are named `${contextName}InvariantError`
   */
  static forContext<TCode extends string>(
    contextName: string
  ): new (code: TCode, message: string, context?: UnknownRecord) => InvariantError<TCode> {
    const ContextInvariantError = class extends InvariantError<TCode> {
      constructor(code: TCode, message: string, context?: UnknownRecord) {
        super(code, message, context);
        this.name = `${contextName}InvariantError`;
      }
    };

    Object.defineProperty(ContextInvariantError, "name", {
      value: `${contextName}InvariantError`,
      configurable: true,
    });

    return ContextInvariantError;
  }

  static isInvariantError(error: unknown): error is InvariantError {
    return error instanceof InvariantError;
  }

  static hasCode<T extends string>(error: unknown, code: T): error is InvariantError<T> {
    return InvariantError.isInvariantError(error) && error.code === code;
  }
}
