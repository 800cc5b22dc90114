// ============================================
// Agent Module - Barrel Export
// ============================================

export {
  type CompactionDeps,
  type CompactionOutcome,
  type CompactOptions,
  compactConversation,
  fallbackSummary,
  formatTurnsForSummary,
  SUMMARY_HEADING,
  splitForCompaction,
  summaryPrompt,
} from "./compaction.js";
export {
  type AgentDefinition,
  buildDelegationPrompt,
  createDelegateTool,
  DELEGATE_TOOL_NAME,
  type DelegationHost,
} from "./delegation.js";
export { type AgentLoopOptions, type AgentRun, AgentLoop, type RunOptions } from "./loop.js";
export { type AgentResult, costSummary, isSuccess, textChunks, toolCalls } from "./result.js";
export {
  DEFAULT_STALL_WINDOW,
  normalizeResponse,
  StallDetector,
  type StallDetectorConfig,
  type StallResult,
} from "./stall-detector.js";
export {
  isTerminalState,
  isValidTransition,
  type RunState,
  RunStateMachine,
  RunStateSchema,
  STOP_REASON_STATES,
  type StopReason,
  StopReasonSchema,
  VALID_TRANSITIONS,
} from "./state.js";
export {
  extractJson,
  NO_JSON_FOUND,
  outputInstructions,
  parseStructuredOutput,
} from "./structured-output.js";
