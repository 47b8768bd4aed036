/**
 * ## Invariant Framework - Declarative Business Rules
 *
 * Builds an invariant with `check()`, `assert()` and `validate()` from a single
 * configuration object, so a rule is written once and consumed three ways.
 *
 * @example
 * ```typescript
 * const collectionHasRoom = createInvariant<OwnedCollection, CollectionErrorCode, [number]>({
 *   name: "collectionHasRoom",
 *   code: "COLLECTION_FULL",
 *   check: (collection, incoming) => collection.size + incoming <= limit,
 *   message: (collection, incoming) =>
 *     `Cannot hold ${collection.size + incoming} attachments (limit ${limit})`,
 *   context: (collection, incoming) => ({ current: collection.size, incoming }),
 * }, CollectionInvariantError);
 *
 * collectionHasRoom.assert(collection, 3);
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Invariant, InvariantErrorConstructor, InvariantResult } from "./types.js";

/**
 * Configuration for creating an invariant.
 *
 * @typeParam TState - The state type being validated
 * @typeParam TCode - The error code type
 * @typeParam TParams - Additional parameters beyond state
 */
export interface InvariantConfig<TState, TCode extends string, TParams extends unknown[] = []> {
  /** Unique name for this invariant (for introspection/debugging) */
  name: string;

  /** Error code when invariant is violated */
  code: TCode;

  /** Returns true if the state is valid */
  check: (state: TState, ...params: TParams) => boolean;

  /** Human-readable message for a violation */
  message: (state: TState, ...params: TParams) => string;

  /** Optional debugging context for a violation */
  context?: (state: TState, ...params: TParams) => UnknownRecord;
}

/**
 * Create a typed invariant from configuration.
 *
 * @param config - Configuration for the invariant
 * @param ErrorClass - Context-specific error class (from InvariantError.forContext())
 */
export function createInvariant<TState, TCode extends string, TParams extends unknown[] = []>(
  config: InvariantConfig<TState, TCode, TParams>,
  ErrorClass: InvariantErrorConstructor<TCode>
): Invariant<TState, TCode, TParams> {
  const { name, code, check, message, context } = config;

  return {
    name,
    code,

    check(state: TState, ...params: TParams): boolean {
      return check(state, ...params);
    },

    assert(state: TState, ...params: TParams): void {
      if (!check(state, ...params)) {
        throw new ErrorClass(code, message(state, ...params), context?.(state, ...params));
      }
    },

    validate(state: TState, ...params: TParams): InvariantResult<TCode> {
      if (check(state, ...params)) {
        return { valid: true };
      }

      const errorMessage = message(state, ...params);
      const errorContext = context?.(state, ...params);

      if (errorContext !== undefined) {
        return { valid: false, code, message: errorMessage, context: errorContext };
      }
      return { valid: false, code, message: errorMessage };
    },
  };
}
