/**
 * ## defineFSM - Type-Safe State Machine Factory
 *
 * Creates an FSM instance from a definition. The definition is checked once
 * (every target must be a declared state) and each state's targets are kept
 * in a set, so transition checks are O(1).
 *
 * | Method | Returns | Purpose |
 * |--------|---------|---------|
 * | `canTransition(from, to)` | `boolean` | Check if transition valid |
 * | `assertTransition(from, to)` | `void` | Throw if invalid |
 * | `validTransitions(from)` | `TState[]` | List valid targets |
 * | `isTerminal(state)` | `boolean` | Check for end state |
 * | `isValidState(state)` | `boolean` | Type guard for state |
 *
 * @example
 * ```typescript
 * import { defineFSM } from "@atrium/fsm";
 *
 * type AttachmentState = "absent" | "attached" | "primary" | "detached";
 *
 * export const attachmentFSM = defineFSM<AttachmentState>({
 *   initial: "absent",
 *   transitions: {
 *     absent: ["attached", "primary"],
 *     attached: ["primary", "detached"],
 *     primary: ["attached", "detached"],
 *     detached: [],
 *   },
 * });
 *
 * attachmentFSM.assertTransition("attached", "primary"); // ok
 * attachmentFSM.assertTransition("detached", "primary"); // throws FSMTransitionError
 * ```
 */

import type { FSM, FSMDefinition } from "./types.js";
import { FSMTransitionError } from "./types.js";

/**
 * Create a type-safe FSM from a definition.
 *
 * @throws Error if the initial state or a transition target is not a declared
 * state
 */
export function defineFSM<TState extends string>(definition: FSMDefinition<TState>): FSM<TState> {
  const states = new Set<string>(Object.keys(definition.transitions));
  if (!states.has(definition.initial)) {
    throw new Error(`Initial state "${definition.initial}" is not a declared state`);
  }

  const targets = new Map<string, ReadonlySet<string>>();
  for (const [from, allowed] of Object.entries<readonly TState[]>(definition.transitions)) {
    const undeclared = allowed.find((to) => !states.has(to));
    if (undeclared !== undefined) {
      throw new Error(`Transition "${from}" -> "${undeclared}" targets an undeclared state`);
    }
    targets.set(from, new Set(allowed));
  }

  const canTransition = (from: TState, to: TState): boolean => targets.get(from)?.has(to) ?? false;
  const validTransitions = (from: TState): readonly TState[] => definition.transitions[from] ?? [];

  return {
    definition,
    initial: definition.initial,
    canTransition,
    validTransitions,

    assertTransition(from: TState, to: TState): void {
      if (!canTransition(from, to)) {
        throw new FSMTransitionError(from, to, validTransitions(from));
      }
    },

    isTerminal(state: TState): boolean {
      return (targets.get(state)?.size ?? 0) === 0;
    },

    isValidState(state: string): state is TState {
      return states.has(state);
    },
  };
}
