/**
 * ## Logging Infrastructure - Scoped Loggers
 *
 * Factory for component loggers with scope prefixes and level filtering.
 *
 * ### When to Use
 *
 * - Creating component loggers with consistent scope prefixes
 * - Level-based log filtering (DEBUG, TRACE, INFO, REPORT, WARN, ERROR)
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Collections:mutator", "INFO");
 *
 * logger.debug("This is suppressed");  // Not logged
 * logger.info("Operation started");    // [Collections:mutator] Operation started
 * logger.error("Failed");              // [Collections:mutator] Failed
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Resolved on every call so tests can spy on console after module import.
 */
function getRuntimeConsole(): Console {
  return globalThis.console;
}

type ConsoleMethod = "debug" | "info" | "log" | "warn" | "error";

const CONSOLE_METHOD: Record<Exclude<LogLevel, "REPORT">, ConsoleMethod> = {
  DEBUG: "debug",
  TRACE: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
};

/**
 * Create a scoped logger with level filtering.
 *
 * Messages below `level` are dropped. Everything else goes to the console
 * method of its level as `[scope] message {data}`, except REPORT, written
 * with `console.log` as one JSON object (scope, message, data fields,
 * timestamp).
 *
 * @param scope - Prefix for log messages (e.g., "Collections:mutator")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const format = (message: string, data?: UnknownRecord): string =>
    data && Object.keys(data).length > 0
      ? `${prefix} ${message} ${JSON.stringify(data)}`
      : `${prefix} ${message}`;

  const emit = (messageLevel: LogLevel, message: string, data?: UnknownRecord): void => {
    if (!shouldLog(messageLevel, level)) {
      return;
    }
    const runtime = getRuntimeConsole();

    if (messageLevel === "REPORT") {
      runtime.log(JSON.stringify({ scope, message, ...data, timestamp: Date.now() }));
      return;
    }

    runtime[CONSOLE_METHOD[messageLevel]](format(message, data));
  };

  return {
    debug: (message, data) => emit("DEBUG", message, data),
    trace: (message, data) => emit("TRACE", message, data),
    info: (message, data) => emit("INFO", message, data),
    report: (message, data) => emit("REPORT", message, data),
    warn: (message, data) => emit("WARN", message, data),
    error: (message, data) => emit("ERROR", message, data),
  };
}

/**
 * Create a logger that discards all messages.
 *
 * @example
 * ```typescript
 * const logger = options.logger ?? createNoOpLogger();
 * ```
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}
