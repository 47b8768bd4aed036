/**
 * Factory for invariant sets (grouped invariants).
 *
 * @example
 * ```typescript
 * const saveInvariants = createInvariantSet([hasSinglePrimary, keysAreIntegers]);
 *
 * saveInvariants.assertAll(collection); // fail-fast
 *
 * const result = saveInvariants.validateAll(collection);
 * if (!result.valid) {
 *   logger.warn("Collection is inconsistent", { violations: result.violations });
 * }
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Invariant, InvariantSet, InvariantSetResult } from "./types.js";

/**
 * Create an invariant set from an array of invariants.
 *
 * Errors thrown by `assertAll()` use each invariant's own error class.
 */
export function createInvariantSet<TState, TCode extends string>(
  invariants: Array<Invariant<TState, TCode, []>>
): InvariantSet<TState, TCode> {
  const frozenInvariants = Object.freeze([...invariants]);

  return {
    invariants: frozenInvariants,

    checkAll(state: TState): boolean {
      return frozenInvariants.every((inv) => inv.check(state));
    },

    assertAll(state: TState): void {
      for (const inv of frozenInvariants) {
        inv.assert(state);
      }
    },

    validateAll(state: TState): InvariantSetResult<TCode> {
      const violations: Array<{ code: TCode; message: string; context?: UnknownRecord }> = [];

      for (const inv of frozenInvariants) {
        const result = inv.validate(state);
        if (!result.valid) {
          const violation: { code: TCode; message: string; context?: UnknownRecord } = {
            code: result.code,
            message: result.message,
          };
          if (result.context !== undefined) {
            violation.context = result.context;
          }
          violations.push(violation);
        }
      }

      if (violations.length === 0) {
        return { valid: true };
      }

      return { valid: false, violations };
    },
  };
}
