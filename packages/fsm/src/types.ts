/**
 * ## FSM Types - Explicit State Transition Rules
 *
 * A finite state machine makes the lifecycle of a domain object explicit:
 * every legal move between two states is listed, everything else is refused.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `FSMDefinition<TState>` | Configuration: initial state + transition map |
 * | `FSM<TState>` | Instance with validation methods |
 * | `FSMTransitionError` | Error thrown for invalid transitions |
 *
 * ### Definition Structure
 *
 * ```typescript
 * {
 *   initial: "absent",
 *   transitions: {
 *     absent: ["attached", "primary"],
 *     attached: ["primary", "detached"],
 *     primary: ["attached", "detached"],
 *     detached: [],            // Terminal state (empty array)
 *   },
 * }
 * ```
 */

/**
 * FSM definition for a set of states with allowed transitions.
 *
 * @typeParam TState - Union type of all valid states (string literals)
 */
export interface FSMDefinition<TState extends string> {
  /**
   * The state every new entity starts in.
   */
  initial: TState;

  /**
   * Map of state → allowed target states.
   * Empty array = terminal state (no outgoing transitions).
   */
  transitions: Record<TState, readonly TState[]>;
}

/**
 * A complete FSM instance with validation operations.
 *
 * Created by `defineFSM()`.
 *
 * @typeParam TState - Union type of all valid states
 */
export interface FSM<TState extends string> {
  readonly definition: FSMDefinition<TState>;

  readonly initial: TState;

  /**
   * Check if a transition from one state to another is valid.
   */
  canTransition(from: TState, to: TState): boolean;

  /**
   * Assert that a transition is valid.
   *
   * @throws FSMTransitionError if transition is not allowed
   */
  assertTransition(from: TState, to: TState): void;

  /**
   * All valid target states from a given state.
   */
  validTransitions(from: TState): readonly TState[];

  /**
   * Check if a state is terminal (no outgoing transitions).
   */
  isTerminal(state: TState): boolean;

  /**
   * Type guard: is `state` one of the states of this FSM?
   */
  isValidState(state: string): state is TState;
}

/**
 * Error thrown when an invalid FSM transition is attempted.
 */
export class FSMTransitionError extends Error {
  readonly code = "FSM_INVALID_TRANSITION";
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(from: string, to: string, validTransitions: readonly string[]) {
    const validList =
      validTransitions.length > 0 ? validTransitions.join(", ") : "(none - terminal state)";
    super(`Invalid transition from "${from}" to "${to}". Valid transitions: ${validList}`);
    this.name = "FSMTransitionError";
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
    Object.setPrototypeOf(this, FSMTransitionError.prototype);
  }

  /**
   * Type guard to check if an error is an FSMTransitionError.
   */
  static isFSMTransitionError(error: unknown): error is FSMTransitionError {
    return error instanceof FSMTransitionError;
  }
}
