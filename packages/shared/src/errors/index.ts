export { ErrorCode } from "./codes.js";
export { type ErrorSeverity, inferSeverity, isRetryableSeverity } from "./severity.js";
