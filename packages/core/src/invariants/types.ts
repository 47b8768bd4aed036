/**
 * Types for the declarative invariant framework.
 *
 * @example
 * ```typescript
 * const hasSinglePrimary = createInvariant<OwnedCollection, CollectionErrorCode>({
 *   name: "hasSinglePrimary",
 *   code: "PRIMARY_INVARIANT_BROKEN",
 *   check: (collection) => countPrimaries(collection) === (collection.isEmpty ? 0 : 1),
 *   message: (collection) => `Expected one primary, found ${countPrimaries(collection)}`,
 * }, CollectionInvariantError);
 *
 * hasSinglePrimary.check(collection);    // boolean
 * hasSinglePrimary.assert(collection);   // throws or void
 * hasSinglePrimary.validate(collection); // InvariantResult
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { InvariantError } from "./InvariantError.js";

/**
 * Constructor type returned by `InvariantError.forContext()`.
 */
export type InvariantErrorConstructor<TCode extends string> = new (
  code: TCode,
  message: string,
  context?: UnknownRecord
) => InvariantError<TCode>;

/**
 * A single rule that can be checked against state.
 *
 * @typeParam TState - The state type being validated
 * @typeParam TCode - The error code type
 * @typeParam TParams - Additional parameters beyond state (default: none)
 */
export interface Invariant<TState, TCode extends string = string, TParams extends unknown[] = []> {
  /** Unique identifier for this invariant (for introspection) */
  readonly name: string;

  /** Error code thrown when invariant is violated */
  readonly code: TCode;

  /**
   * Non-throwing check.
   */
  check(state: TState, ...params: TParams): boolean;

  /**
   * @throws InvariantError if state violates the invariant
   */
  assert(state: TState, ...params: TParams): void;

  /**
   * Structured, non-throwing result.
   */
  validate(state: TState, ...params: TParams): InvariantResult<TCode>;
}

export type InvariantResult<TCode extends string = string> =
  | { valid: true }
  | { valid: false; code: TCode; message: string; context?: UnknownRecord };

/**
 * A set of invariants that are checked together.
 *
 * - `assertAll`: throws on first failure
 * - `validateAll`: collects every violation
 */
export interface InvariantSet<TState, TCode extends string = string> {
  readonly invariants: ReadonlyArray<Invariant<TState, TCode, []>>;

  /**
   * Invariants are checked in array order; stops at the first violation.
   *
   * @throws InvariantError if any invariant is violated
   */
  assertAll(state: TState): void;

  checkAll(state: TState): boolean;

  /**
   * Does NOT short-circuit.
   */
  validateAll(state: TState): InvariantSetResult<TCode>;
}

export type InvariantSetResult<TCode extends string = string> =
  | { valid: true }
  | {
      valid: false;
      violations: Array<{ code: TCode; message: string; context?: UnknownRecord }>;
    };
