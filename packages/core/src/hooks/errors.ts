import { ErrorCode } from "@helmsman/shared";
import { HelmsmanError, type HelmsmanErrorOptions } from "../errors/index.js";
import type { HookEvent } from "./types.js";

export interface HookErrorOptions extends HelmsmanErrorOptions {
  hookName?: string;
  event?: HookEvent;
}

/**
 * A hook callback threw, timed out or returned a malformed result.
 *
 * @example
 * ```typescript
 * for (const record of pipeline.getErrorLog()) {
 *   console.error(`[${record.event}] ${record.hookName}: ${record.error}`);
 * }
 * ```
 */
export class HookExecutionError extends HelmsmanError {
  public readonly hookName?: string;
  public readonly event?: HookEvent;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.HOOK_EXECUTION_FAILED,
    options?: HookErrorOptions
  ) {
    super(message, code, {
      ...options,
      context: { ...options?.context, hookName: options?.hookName, event: options?.event },
    });
    this.name = "HookExecutionError";
    this.hookName = options?.hookName;
    this.event = options?.event;
  }
}

export class HookTimeoutError extends HookExecutionError {
  public readonly timeout: number;

  constructor(hookName: string, timeout: number, event?: HookEvent) {
    super(`Hook '${hookName}' timed out after ${timeout}ms`, ErrorCode.HOOK_TIMEOUT, {
      hookName,
      event,
    });
    this.name = "HookTimeoutError";
    this.timeout = timeout;
  }
}
