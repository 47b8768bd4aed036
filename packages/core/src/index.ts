/**
 * @atrium/core
 *
 * Shared building blocks for Atrium packages: invariants, logging, ids,
 * repository errors, operation results and versioned documents.
 */

export type { UnknownRecord } from "./types.js";
export { assertNever, errorMessage } from "./types.js";

export * from "./invariants/index.js";
export * from "./logging/index.js";
export * from "./ids/index.js";
export * from "./repository/index.js";
export * from "./results/index.js";
export * from "./documents/index.js";
