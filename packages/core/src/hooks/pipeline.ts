/**
 * Hook Pipeline
 *
 * Ordered registry of lifecycle hooks. `fire` runs the matching hooks in
 * registration order and returns the first result that is not absent.
 *
 * Failures never escape `fire`. A failing PreToolUse hook denies the call; a
 * failing hook on any other event is skipped. Either way the failure is
 * logged and kept in the error log.
 *
 * A hook with a non-zero timeout runs in its own worker thread, which is
 * terminated when the deadline passes; a timeout of 0 runs it inline.
 *
 * @module @helmsman/core/hooks
 */

import { ErrorCode } from "@helmsman/shared";
import { errorMessage, HelmsmanError } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logger/index.js";
import { runIsolated } from "./isolation.js";
import {
  type AnyHookMatcher,
  DEFAULT_HOOK_TIMEOUT,
  HOOK_RESULT_SCHEMAS,
  type HookArgs,
  type HookErrorRecord,
  type HookEvent,
  type HookResult,
  type HookResultMap,
  TOOL_EVENTS,
} from "./types.js";

// =============================================================================
// Error Policy
// =============================================================================

/** Reason attached to the denial a failing PreToolUse hook produces */
export const HOOK_FAILURE_REASON = "hook callback error";

/**
 * Result substituted for a failed hook. Only PreToolUse fails closed.
 */
const ERROR_FALLBACKS: { readonly [E in HookEvent]: () => HookResultMap[E] | undefined } = {
  PreToolUse: () => ({ permission: "deny", reason: HOOK_FAILURE_REASON, continue: true }),
  PostToolUse: () => undefined,
  Stop: () => undefined,
  SessionStart: () => undefined,
  SessionEnd: () => undefined,
  SubagentStop: () => undefined,
  PreCompact: () => undefined,
  UserPromptSubmit: () => undefined,
};

// =============================================================================
// Pipeline
// =============================================================================

interface RegisteredHook {
  readonly event: HookEvent;
  readonly name: string;
  readonly callback: (...args: never[]) => unknown;
  readonly pattern?: RegExp;
  readonly timeout: number;
}

export interface HookPipelineOptions {
  logger?: Logger;
  /** Timeout for hooks registered without one (default: 30s) */
  defaultTimeout?: number;
}

/**
 * @example
 * ```typescript
 * const hooks = new HookPipeline({ logger });
 * hooks.register({
 *   event: "PreToolUse",
 *   pattern: "^run_bash$",
 *   callback: () => ({ permission: "deny", reason: "no shell today" }),
 * });
 *
 * const result = await hooks.fire("PreToolUse", "run_bash", { command: "ls" }, { workingDir, turn: 1 });
 * // { permission: "deny", reason: "no shell today", continue: true }
 * ```
 */
export class HookPipeline {
  readonly #hooks: RegisteredHook[] = [];
  readonly #errorLog: HookErrorRecord[] = [];
  readonly #logger: Logger;
  readonly #defaultTimeout: number;
  #registered = 0;

  constructor(options: HookPipelineOptions = {}) {
    this.#logger = options.logger ?? createSilentLogger();
    this.#defaultTimeout = options.defaultTimeout ?? DEFAULT_HOOK_TIMEOUT;
  }

  /**
   * Add a hook after the ones already registered.
   *
   * @returns Function that removes the hook again
   * @throws HelmsmanError when the timeout or pattern is invalid
   */
  register(matcher: AnyHookMatcher): () => void {
    const timeout = matcher.timeout ?? this.#defaultTimeout;
    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new HelmsmanError(`Invalid hook timeout: ${timeout}`, ErrorCode.INVALID_ARGUMENT);
    }

    this.#registered += 1;
    const hook: RegisteredHook = {
      event: matcher.event,
      name: matcher.name ?? `${matcher.event}#${this.#registered}`,
      callback: matcher.callback,
      pattern: compilePattern(matcher.pattern),
      timeout,
    };
    this.#hooks.push(hook);

    return () => {
      const index = this.#hooks.indexOf(hook);
      if (index !== -1) {
        this.#hooks.splice(index, 1);
      }
    };
  }

  get size(): number {
    return this.#hooks.length;
  }

  /**
   * Run the hooks registered for `event`. Resolves with the first non-absent
   * result, or `undefined` when every hook passed. Never rejects.
   */
  async fire<E extends HookEvent>(event: E, ...args: HookArgs<E>): Promise<HookResult<E> | undefined> {
    const argList: readonly unknown[] = args;
    const first = argList[0];
    const toolName = TOOL_EVENTS.has(event) && typeof first === "string" ? first : undefined;

    for (const hook of this.#hooks) {
      if (hook.event !== event || !matchesTool(hook, toolName)) {
        continue;
      }

      let raw: unknown;
      try {
        raw = await this.#invoke(hook, argList);
      } catch (error) {
        const fallback = this.#fail(hook, event, toolName, error);
        if (fallback !== undefined) {
          return fallback;
        }
        continue;
      }

      if (raw === undefined || raw === null) {
        continue;
      }

      const parsed = HOOK_RESULT_SCHEMAS[event].safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
        const fallback = this.#fail(hook, event, toolName, `Invalid ${event} result: ${issues}`);
        if (fallback !== undefined) {
          return fallback;
        }
        continue;
      }

      this.#logger.debug("Hook returned a result", { hook: hook.name, event, toolName });
      return parsed.data;
    }

    return undefined;
  }

  /** Failures recorded so far, oldest first */
  getErrorLog(): readonly HookErrorRecord[] {
    return [...this.#errorLog];
  }

  clearErrorLog(): void {
    this.#errorLog.length = 0;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  async #invoke(hook: RegisteredHook, args: readonly unknown[]): Promise<unknown> {
    if (hook.timeout === 0) {
      const value: unknown = await Reflect.apply(hook.callback, undefined, args);
      return value;
    }
    return runIsolated(hook.callback, args, { timeout: hook.timeout, hookName: hook.name, event: hook.event });
  }

  #fail<E extends HookEvent>(
    hook: RegisteredHook,
    event: E,
    toolName: string | undefined,
    error: unknown
  ): HookResult<E> | undefined {
    const message = errorMessage(error);
    this.#errorLog.push({ event, toolName, hookName: hook.name, error: message, timestamp: new Date() });

    const fallback = ERROR_FALLBACKS[event]();
    this.#logger.error(`Hook '${hook.name}' failed on ${event}: ${message}`, {
      toolName,
      failClosed: fallback !== undefined,
    });
    return fallback;
  }
}

function compilePattern(pattern: RegExp | string | undefined): RegExp | undefined {
  if (pattern === undefined || pattern instanceof RegExp) {
    return pattern;
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new HelmsmanError(`Invalid hook pattern: ${pattern}`, ErrorCode.INVALID_ARGUMENT, { cause: error });
  }
}

function matchesTool(hook: RegisteredHook, toolName: string | undefined): boolean {
  if (!hook.pattern) {
    return true;
  }
  if (toolName === undefined) {
    return false;
  }
  hook.pattern.lastIndex = 0;
  return hook.pattern.test(toolName);
}
