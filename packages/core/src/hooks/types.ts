/**
 * Hook Type Definitions
 *
 * Lifecycle events, the callback signature for each event and the schema
 * each callback's result must satisfy.
 *
 * @module @helmsman/core/hooks
 */

import { z } from "zod";
import type { StopReason } from "../agent/state.js";
import type { PolicyDescription } from "../permission/policy.js";
import type { ToolAnnotations, ToolInput } from "../permission/types.js";
import type { Turn, Usage } from "../provider/types.js";

// =============================================================================
// Constants
// =============================================================================

/** Default time box for one hook invocation, in ms */
export const DEFAULT_HOOK_TIMEOUT = 30000;

// =============================================================================
// HookEvent
// =============================================================================

/**
 * Lifecycle points where hooks fire:
 *
 * - `PreToolUse` - after the permission gate allowed a call, before it runs (fail-closed)
 * - `PostToolUse` - after a tool returned or failed
 * - `Stop` - the run reached a terminal state
 * - `SessionStart` - before the first turn of a run
 * - `SessionEnd` - after `Stop`, last thing a run does
 * - `SubagentStop` - a delegated sub-agent finished
 * - `PreCompact` - before history is compacted
 * - `UserPromptSubmit` - the task is about to be sent
 */
export const HookEventSchema = z.enum([
  "PreToolUse",
  "PostToolUse",
  "Stop",
  "SessionStart",
  "SessionEnd",
  "SubagentStop",
  "PreCompact",
  "UserPromptSubmit",
]);

export type HookEvent = z.infer<typeof HookEventSchema>;

export const HOOK_EVENTS = HookEventSchema.options;

/** Events whose first callback argument is a tool name */
export const TOOL_EVENTS: ReadonlySet<HookEvent> = new Set(["PreToolUse", "PostToolUse"]);

// =============================================================================
// Results
// =============================================================================

export const PreToolUseResultSchema = z.object({
  permission: z.enum(["allow", "deny"]),
  reason: z.string().optional(),
  /** `false` asks the loop to stop after the current step */
  continue: z.boolean().default(true),
});

const ContinueResultSchema = z.object({
  continue: z.boolean().default(true),
});

const HandledResultSchema = z.object({
  handled: z.boolean().optional(),
});

export const PreCompactResultSchema = z.object({
  /** `false` cancels the compaction */
  continue: z.boolean().default(true),
  /** Used instead of asking the model for a summary */
  summary: z.string().optional(),
});

type ContinueResult = z.output<typeof ContinueResultSchema>;
type HandledResult = z.output<typeof HandledResultSchema>;

/** Validated result per event */
export interface HookResultMap {
  PreToolUse: z.output<typeof PreToolUseResultSchema>;
  PostToolUse: ContinueResult;
  Stop: HandledResult;
  SessionStart: ContinueResult;
  SessionEnd: HandledResult;
  SubagentStop: ContinueResult;
  PreCompact: z.output<typeof PreCompactResultSchema>;
  UserPromptSubmit: ContinueResult;
}

/** What a callback may return; optional fields take their defaults */
export interface HookResultInputMap {
  PreToolUse: z.input<typeof PreToolUseResultSchema>;
  PostToolUse: z.input<typeof ContinueResultSchema>;
  Stop: z.input<typeof HandledResultSchema>;
  SessionStart: z.input<typeof ContinueResultSchema>;
  SessionEnd: z.input<typeof HandledResultSchema>;
  SubagentStop: z.input<typeof ContinueResultSchema>;
  PreCompact: z.input<typeof PreCompactResultSchema>;
  UserPromptSubmit: z.input<typeof ContinueResultSchema>;
}

export type HookResult<E extends HookEvent = HookEvent> = HookResultMap[E];

export const HOOK_RESULT_SCHEMAS: {
  readonly [E in HookEvent]: z.ZodType<HookResultMap[E], z.ZodTypeDef, unknown>;
} = {
  PreToolUse: PreToolUseResultSchema,
  PostToolUse: ContinueResultSchema,
  Stop: HandledResultSchema,
  SessionStart: ContinueResultSchema,
  SessionEnd: HandledResultSchema,
  SubagentStop: ContinueResultSchema,
  PreCompact: PreCompactResultSchema,
  UserPromptSubmit: ContinueResultSchema,
};

/**
 * True when a result carries `continue: false`.
 */
export function requestsStop(result: HookResult | undefined): boolean {
  return result !== undefined && "continue" in result && result.continue === false;
}

// =============================================================================
// Contexts
// =============================================================================

export interface HookContext {
  workingDir: string;
}

export interface PreToolUseContext extends HookContext {
  annotations?: ToolAnnotations;
  /** 1-based number of the turn that requested the call */
  turn: number;
}

export interface PostToolUseContext extends HookContext {
  turn: number;
}

export interface RunEndContext extends HookContext {
  totalTurns: number;
  cost: Usage;
}

export interface SessionStartContext extends HookContext {
  policy: PolicyDescription;
  toolNames: string[];
}

export interface PreCompactContext extends HookContext {
  totalTurns: number;
  compactCount: number;
}

// =============================================================================
// Callbacks
// =============================================================================

/** Absent (`undefined`, `null` or no return) passes to the next hook */
export type HookReturn<T> = T | null | undefined | void | Promise<T | null | undefined | void>;

/**
 * Positional arguments per event. Every event ends with its context.
 */
export interface HookArgsMap {
  PreToolUse: [toolName: string, toolInput: ToolInput, context: PreToolUseContext];
  PostToolUse: [toolName: string, toolResult: unknown, toolError: string | undefined, context: PostToolUseContext];
  Stop: [reason: StopReason, context: RunEndContext];
  SessionStart: [context: SessionStartContext];
  SessionEnd: [reason: StopReason, context: RunEndContext];
  SubagentStop: [agentName: string, task: string, result: string, context: HookContext];
  PreCompact: [turnsToCompact: readonly Turn[], turnsToKeep: readonly Turn[], context: PreCompactContext];
  UserPromptSubmit: [prompt: string, context: HookContext];
}

export type HookArgs<E extends HookEvent> = HookArgsMap[E];

export type HookCallback<E extends HookEvent> = (...args: HookArgsMap[E]) => HookReturn<HookResultInputMap[E]>;

export type HookCallbacks = { [E in HookEvent]: HookCallback<E> };

/**
 * A hook registration.
 *
 * @example
 * ```typescript
 * pipeline.register({
 *   event: "PreToolUse",
 *   pattern: /^run_bash$/,
 *   callback: (toolName, input) =>
 *     String(input.command).includes("rm -rf")
 *       ? { permission: "deny", reason: "destructive command", continue: false }
 *       : undefined,
 * });
 * ```
 */
export interface HookMatcher<E extends HookEvent> {
  event: E;
  callback: HookCallback<E>;
  /** Shown in logs and the error log (default `<event>#<n>`) */
  name?: string;
  /** Tested against the tool name; only matches PreToolUse and PostToolUse */
  pattern?: RegExp | string;
  /**
   * ms (default 30000). Any non-zero timeout runs the callback in a worker
   * thread that is terminated at the deadline, so the callback must be a
   * self-contained function expression and its arguments and result must be
   * structured-cloneable. 0 runs it inline with no time box.
   */
  timeout?: number;
}

/** A registration for any event, discriminated by `event` */
export type AnyHookMatcher = { [E in HookEvent]: HookMatcher<E> }[HookEvent];

export interface HookErrorRecord {
  event: HookEvent;
  toolName?: string;
  hookName: string;
  error: string;
  timestamp: Date;
}
