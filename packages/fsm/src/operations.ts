/**
 * Standalone FSM operations.
 *
 * Same checks as the FSM instance methods, as plain functions that take the
 * FSM as their first argument. Handy when a transition check is passed around
 * as a callback.
 */

import type { FSM } from "./types.js";

export function canTransition<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): boolean {
  return fsm.canTransition(from, to);
}

/**
 * @throws FSMTransitionError if transition is not allowed
 */
export function assertTransition<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): void {
  fsm.assertTransition(from, to);
}

export function validTransitions<TState extends string>(
  fsm: FSM<TState>,
  from: TState
): readonly TState[] {
  return fsm.validTransitions(from);
}

export function isTerminal<TState extends string>(fsm: FSM<TState>, state: TState): boolean {
  return fsm.isTerminal(state);
}

export function isValidState<TState extends string>(
  fsm: FSM<TState>,
  state: string
): state is TState {
  return fsm.isValidState(state);
}
