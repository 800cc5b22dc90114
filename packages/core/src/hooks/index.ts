export { HookExecutionError, type HookErrorOptions, HookTimeoutError } from "./errors.js";
export { type IsolationOptions, runIsolated } from "./isolation.js";
export { createToolLogHooks } from "./log-hooks.js";
export { HOOK_FAILURE_REASON, HookPipeline, type HookPipelineOptions } from "./pipeline.js";
export {
  type AnyHookMatcher,
  DEFAULT_HOOK_TIMEOUT,
  HOOK_EVENTS,
  HOOK_RESULT_SCHEMAS,
  type HookArgs,
  type HookArgsMap,
  type HookCallback,
  type HookCallbacks,
  type HookContext,
  type HookErrorRecord,
  type HookEvent,
  HookEventSchema,
  type HookMatcher,
  type HookResult,
  type HookResultInputMap,
  type HookResultMap,
  type HookReturn,
  type PostToolUseContext,
  PreCompactResultSchema,
  type PreCompactContext,
  type PreToolUseContext,
  PreToolUseResultSchema,
  requestsStop,
  type RunEndContext,
  type SessionStartContext,
  TOOL_EVENTS,
} from "./types.js";
