/**
 * Logging Module
 *
 * Six-level logging with scoped loggers, a no-op logger and mock loggers.
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@atrium/core";
 *
 * const level: LogLevel = config.logLevel;
 * const mutatorLogger = createScopedLogger("Collections:mutator", level);
 * const silentLogger = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export {
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  shouldLog,
  isLogLevel,
} from "./types.js";

// Factories
export { createScopedLogger, createNoOpLogger } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";

// Operation logging helpers
export type { BaseOperationLogContext } from "./operations.js";
export {
  logOperationStart,
  logOperationSuccess,
  logOperationRejected,
  logOperationFailed,
  logOperationError,
} from "./operations.js";
