/**
 * Testing utilities for logging infrastructure.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const mutator = new CollectionMutator({ fileStore, gateway, logger });
 *
 * await mutator.detach(owner, recordId);
 *
 * expect(logger.hasLoggedAt("WARN", "Stored file could not be deleted")).toBe(true);
 * logger.clear();
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

/**
 * A single log call captured by the mock logger.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  /** undefined if not provided */
  data: UnknownRecord | undefined;
  timestamp: number;
}

/**
 * Logger that records every call for assertion.
 */
export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;

  clear(): void;

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;

  /**
   * Partial match on the message, any level.
   */
  hasLoggedMessage(message: string): boolean;

  /**
   * Partial match on the message at one level.
   */
  hasLoggedAt(level: LogLevel, message: string): boolean;

  getLastCallAt(level: LogLevel): LogCall | undefined;
}

/**
 * Create a mock logger for testing.
 *
 * The `calls` array is unbounded; call `clear()` between scenarios in
 * long-running suites.
 */
export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];
  const atLevel = (level: LogLevel): LogCall[] => calls.filter((call) => call.level === level);

  const record =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data, timestamp: Date.now() });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel: atLevel,

    hasLoggedMessage(message: string): boolean {
      return calls.some((call) => call.message.includes(message));
    },

    hasLoggedAt(level: LogLevel, message: string): boolean {
      return atLevel(level).some((call) => call.message.includes(message));
    },

    getLastCallAt(level: LogLevel): LogCall | undefined {
      return atLevel(level).at(-1);
    },

    debug: record("DEBUG"),
    trace: record("TRACE"),
    info: record("INFO"),
    report: record("REPORT"),
    warn: record("WARN"),
    error: record("ERROR"),
  };
}
