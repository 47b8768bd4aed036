/**
 * Shared operation logging helpers.
 *
 * Every state-changing operation logs the same lifecycle: started, then one of
 * succeeded / rejected / failed / errored.
 */
import type { Logger } from "./types.js";

/**
 * Base context for operation logging.
 * Callers extend this with entity-specific fields.
 */
export type BaseOperationLogContext = {
  operation: string;
  [key: string]: unknown;
};

export function logOperationStart(logger: Logger, context: BaseOperationLogContext): void {
  logger.info("Operation started", context);
}

export function logOperationSuccess(
  logger: Logger,
  context: BaseOperationLogContext,
  result: { version: number; warnings?: number }
): void {
  logger.info("Operation succeeded", {
    ...context,
    version: result.version,
    warnings: result.warnings ?? 0,
  });
}

/**
 * Business rule violation: nothing was changed.
 */
export function logOperationRejected(
  logger: Logger,
  context: BaseOperationLogContext,
  reason: { code: string; message: string }
): void {
  logger.warn("Operation rejected", {
    ...context,
    rejectionCode: reason.code,
    rejectionMessage: reason.message,
  });
}

/**
 * Infrastructure failure surfaced to the caller as a failed result.
 */
export function logOperationFailed(
  logger: Logger,
  context: BaseOperationLogContext,
  failure: { code: string; reason: string }
): void {
  logger.error("Operation failed", {
    ...context,
    failureCode: failure.code,
    failureReason: failure.reason,
  });
}

/**
 * Unexpected exception.
 */
export function logOperationError(
  logger: Logger,
  context: BaseOperationLogContext,
  error: unknown
): void {
  logger.error("Operation errored", {
    ...context,
    error: error instanceof Error ? { message: error.message, stack: error.stack } : String(error),
  });
}
