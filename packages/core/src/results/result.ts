/**
 * Result helper functions for operation handlers.
 *
 * @example
 * ```typescript
 * if (!collection.findById(recordId)) {
 *   return rejectedResult("NOT_FOUND", "Attachment not found", { ownerId, recordId });
 * }
 *
 * return successResult({ recordId }, saved.version);
 * ```
 */
import type { UnknownRecord } from "../types.js";
import type {
  OperationFailed,
  OperationRejected,
  OperationResult,
  OperationSuccess,
} from "./types.js";

export function successResult<TData>(data: TData, version: number): OperationSuccess<TData> {
  return { status: "success", data, version };
}

/**
 * Business rule violation. Nothing was changed.
 *
 * @param code - Error code for programmatic handling
 * @param reason - Human-readable error message
 * @param context - Optional context for debugging
 */
export function rejectedResult<TCode extends string>(
  code: TCode,
  reason: string,
  context?: UnknownRecord
): OperationRejected<TCode> {
  return {
    status: "rejected",
    code,
    reason,
    ...(context !== undefined && { context }),
  };
}

/**
 * Infrastructure failure. Any partial effects were compensated before returning.
 */
export function failedResult<TCode extends string>(
  code: TCode,
  reason: string,
  context?: UnknownRecord
): OperationFailed<TCode> {
  return {
    status: "failed",
    code,
    reason,
    ...(context !== undefined && { context }),
  };
}

export function isSuccess<TData, TR extends string, TF extends string>(
  result: OperationResult<TData, TR, TF>
): result is OperationSuccess<TData> {
  return result.status === "success";
}

export function isRejected<TData, TR extends string, TF extends string>(
  result: OperationResult<TData, TR, TF>
): result is OperationRejected<TR> {
  return result.status === "rejected";
}

export function isFailed<TData, TR extends string, TF extends string>(
  result: OperationResult<TData, TR, TF>
): result is OperationFailed<TF> {
  return result.status === "failed";
}
