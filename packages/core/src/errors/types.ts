// ============================================
// Helmsman Error Types
// ============================================

import { ErrorCode, type ErrorSeverity, inferSeverity, isRetryableSeverity } from "@helmsman/shared";

/**
 * Options for creating a HelmsmanError.
 */
export interface HelmsmanErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
  /** Overrides the retry decision inferred from severity */
  isRetryable?: boolean;
}

/**
 * Base error class for all engine errors.
 *
 * Carries a numeric {@link ErrorCode}, a severity inferred from that code and
 * optional structured context for logging.
 */
export class HelmsmanError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  private readonly _isRetryable?: boolean;

  constructor(message: string, code: ErrorCode, options?: HelmsmanErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "HelmsmanError";
    this.code = code;
    this.context = options?.context;
    this._isRetryable = options?.isRetryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  get isRetryable(): boolean {
    return this._isRetryable ?? isRetryableSeverity(this.severity);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      isRetryable: this.isRetryable,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A tool call was blocked by the permission gate or a hook.
 */
export class PermissionDeniedError extends HelmsmanError {
  public readonly toolName: string;

  constructor(toolName: string, reason: string, options?: HelmsmanErrorOptions) {
    super(reason, ErrorCode.PERMISSION_DENIED, {
      ...options,
      context: { ...options?.context, toolName },
    });
    this.name = "PermissionDeniedError";
    this.toolName = toolName;
  }
}

/**
 * A tool ran (or was looked up) and failed.
 */
export class ToolExecutionError extends HelmsmanError {
  public readonly toolName: string;

  constructor(
    toolName: string,
    message: string,
    code: ErrorCode.TOOL_EXECUTION_FAILED | ErrorCode.TOOL_NOT_FOUND = ErrorCode.TOOL_EXECUTION_FAILED,
    options?: HelmsmanErrorOptions
  ) {
    super(message, code, { ...options, context: { ...options?.context, toolName } });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

/**
 * The language-model transport failed.
 */
export class ProviderError extends HelmsmanError {
  constructor(
    message: string,
    code:
      | ErrorCode.PROVIDER_ERROR
      | ErrorCode.PROVIDER_STREAM_FAILED
      | ErrorCode.PROVIDER_INVALID_RESPONSE = ErrorCode.PROVIDER_ERROR,
    options?: HelmsmanErrorOptions
  ) {
    super(message, code, options);
    this.name = "ProviderError";
  }
}

/**
 * Configuration or policy input failed validation.
 */
export class ConfigurationError extends HelmsmanError {
  constructor(
    message: string,
    code: ErrorCode.CONFIG_INVALID | ErrorCode.POLICY_INVALID = ErrorCode.CONFIG_INVALID,
    options?: HelmsmanErrorOptions
  ) {
    super(message, code, options);
    this.name = "ConfigurationError";
  }
}

/**
 * The run's cost ceiling has been reached.
 */
export class BudgetExceededError extends HelmsmanError {
  public readonly costUsed: number;
  public readonly maxCostUsd: number;

  constructor(message: string, costUsed: number, maxCostUsd: number, options?: HelmsmanErrorOptions) {
    super(message, ErrorCode.BUDGET_EXCEEDED, {
      ...options,
      context: { ...options?.context, costUsed, maxCostUsd },
    });
    this.name = "BudgetExceededError";
    this.costUsed = costUsed;
    this.maxCostUsd = maxCostUsd;
  }
}

/**
 * Normalize anything thrown into a message string.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : JSON.stringify(error) ?? String(error);
}

export function isHelmsmanError(error: unknown): error is HelmsmanError {
  return error instanceof HelmsmanError;
}
