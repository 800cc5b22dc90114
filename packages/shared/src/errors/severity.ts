/**
 * Error Severity Types
 *
 * @module @helmsman/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

/**
 * Error severity levels as string literals.
 */
export type ErrorSeverity = "low" | "medium" | "high" | "critical";

/**
 * Infers the appropriate severity level from an error code.
 *
 * - low: transient, likely to succeed when retried
 * - medium: reported back to the model or the user, the run continues
 * - high: ends the current run
 * - critical: the engine itself is in a broken state
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.TIMEOUT:
    case ErrorCode.PROVIDER_STREAM_FAILED:
    case ErrorCode.HOOK_TIMEOUT:
      return "low";

    case ErrorCode.INVALID_ARGUMENT:
    case ErrorCode.PERMISSION_DENIED:
    case ErrorCode.PATH_SECURITY:
    case ErrorCode.TOOL_NOT_FOUND:
    case ErrorCode.TOOL_EXECUTION_FAILED:
    case ErrorCode.TOOL_PERMISSION_DENIED:
    case ErrorCode.HOOK_EXECUTION_FAILED:
    case ErrorCode.HOOK_INVALID_RESULT:
    case ErrorCode.STRUCTURED_OUTPUT_INVALID:
    case ErrorCode.AGENT_NOT_FOUND:
      return "medium";

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.POLICY_INVALID:
    case ErrorCode.PROVIDER_ERROR:
    case ErrorCode.PROVIDER_INVALID_RESPONSE:
    case ErrorCode.BUDGET_EXCEEDED:
    case ErrorCode.TURN_LIMIT_REACHED:
    case ErrorCode.SESSION_ERROR:
    case ErrorCode.AGENT_LOOP_ERROR:
      return "high";

    default:
      return "critical";
  }
}

/**
 * Whether an error with this severity is worth retrying automatically.
 */
export function isRetryableSeverity(severity: ErrorSeverity): boolean {
  return severity === "low";
}
