/**
 * Invariant utilities for domain rule enforcement.
 *
 * - InvariantError: base class for context-specific domain errors
 * - createInvariant: factory for declarative invariant objects
 * - createInvariantSet: grouped invariant validation
 */

export { InvariantError } from "./InvariantError.js";

export type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
} from "./types.js";

export { createInvariant, type InvariantConfig } from "./createInvariant.js";
export { createInvariantSet } from "./createInvariantSet.js";
