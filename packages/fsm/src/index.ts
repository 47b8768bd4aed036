/**
 * Finite State Machine module for explicit state transitions.
 *
 * @example
 * ```typescript
 * import { defineFSM, canTransition } from "@atrium/fsm";
 *
 * type PublicationStatus = "draft" | "published" | "archived";
 *
 * export const publicationFSM = defineFSM<PublicationStatus>({
 *   initial: "draft",
 *   transitions: {
 *     draft: ["published"],
 *     published: ["archived"],
 *     archived: [],
 *   },
 * });
 *
 * if (!canTransition(publicationFSM, page.status, "published")) {
 *   // refuse
 * }
 * ```
 *
 * @module @atrium/fsm
 */

// Types
export type { FSMDefinition, FSM } from "./types.js";
export { FSMTransitionError } from "./types.js";

// Factory
export { defineFSM } from "./defineFSM.js";

// Operations
export {
  canTransition,
  assertTransition,
  validTransitions,
  isTerminal,
  isValidState,
} from "./operations.js";
