/**
 * Operation result types.
 *
 * Every state-changing operation resolves to one of three outcomes:
 *
 * | Status   | Meaning                                   | State changed |
 * |----------|-------------------------------------------|---------------|
 * | success  | Operation applied and persisted           | yes           |
 * | rejected | Business rule violation, caller's mistake | no            |
 * | failed   | Infrastructure failure, rolled back       | no            |
 */

import type { UnknownRecord } from "../types.js";

export interface OperationSuccess<TData> {
  status: "success";
  data: TData;
  /** Owner version after the operation was persisted */
  version: number;
}

export interface OperationRejected<TCode extends string = string> {
  status: "rejected";
  code: TCode;
  reason: string;
  context?: UnknownRecord;
}

export interface OperationFailed<TCode extends string = string> {
  status: "failed";
  code: TCode;
  reason: string;
  context?: UnknownRecord;
}

export type OperationResult<
  TData,
  TRejectedCode extends string = string,
  TFailedCode extends string = string,
> = OperationSuccess<TData> | OperationRejected<TRejectedCode> | OperationFailed<TFailedCode>;
