/**
 * ## Attachment Lifecycle
 *
 * Per-attachment state machine. The collection consults it on every change to
 * a record's membership or primary flag.
 *
 * ```
 * absent ──► attached ◄──► primary
 *   │           │             │
 *   └──────► primary          │
 *               └──► detached ◄┘
 * ```
 *
 * - `absent → primary` only through first-add promotion (or an explicit
 *   primary add)
 * - `primary → attached` only as a side effect of another record becoming
 *   primary
 * - `detached` is terminal: the record is no longer addressable through its
 *   owner
 */

import { defineFSM } from "@atrium/fsm";

export type AttachmentState = "absent" | "attached" | "primary" | "detached";

export const attachmentLifecycle = defineFSM<AttachmentState>({
  initial: "absent",
  transitions: {
    absent: ["attached", "primary"],
    attached: ["primary", "detached"],
    primary: ["attached", "detached"],
    detached: [],
  },
});
