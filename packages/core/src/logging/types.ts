/**
 * Logging Types
 *
 * Defines the Logger interface and the 6-level LogLevel hierarchy shared by
 * every Atrium package.
 *
 * Log levels (most to least verbose):
 * - DEBUG: Internal state details, collection snapshots
 * - TRACE: Performance timing (console.time/timeEnd)
 * - INFO: Operation started/completed
 * - REPORT: Aggregated summaries (JSON output)
 * - WARN: Rejections, cleanup warnings, degraded state
 * - ERROR: Failures, orphaned files
 */

import type { UnknownRecord } from "../types.js";

/**
 * Priority order (lower number = more verbose):
 * DEBUG(0) > TRACE(1) > INFO(2) > REPORT(3) > WARN(4) > ERROR(5)
 */
export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

/**
 * Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface with one method per log level.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Collections:mutator", "DEBUG");
 *
 * logger.debug("Collection loaded", { ownerId, size: 3 });
 * logger.info("Operation started", { operation: "attach" });
 * logger.warn("Stored file could not be deleted", { storedPath });
 * logger.error("Compensating delete failed", { storedPath });
 * ```
 */
export interface Logger {
  /**
   * Internal state details, verbose debugging.
   */
  debug(message: string, data?: UnknownRecord): void;

  /**
   * Step-by-step tracing, finer than DEBUG.
   */
  trace(message: string, data?: UnknownRecord): void;

  /**
   * Operation started/completed, normal milestones.
   */
  info(message: string, data?: UnknownRecord): void;

  /**
   * Aggregated summaries, emitted as a single JSON line.
   */
  report(message: string, data?: UnknownRecord): void;

  /**
   * Rejections, fallback behavior, non-fatal issues.
   */
  warn(message: string, data?: UnknownRecord): void;

  /**
   * Failures and unrecoverable issues.
   */
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false - DEBUG is below INFO
 * shouldLog("WARN", "INFO");  // true
 * shouldLog("INFO", "INFO");  // true - exact match
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

/**
 * Type guard for log level strings (e.g. from environment variables).
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}
