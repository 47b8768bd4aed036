export type {
  OperationSuccess,
  OperationRejected,
  OperationFailed,
  OperationResult,
} from "./types.js";
export {
  successResult,
  rejectedResult,
  failedResult,
  isSuccess,
  isRejected,
  isFailed,
} from "./result.js";
