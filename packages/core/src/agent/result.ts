// ============================================
// Agent Result
// ============================================

import type { AgentEvent, AgentEventOf, CostSummary } from "../events/agent-events.js";
import { eventsOfType } from "../events/agent-events.js";
import type { Turn, Usage } from "../provider/types.js";
import type { StopReason } from "./state.js";

/**
 * Everything a finished run produced.
 *
 * @template T - Type of the structured output, when a schema was given
 */
export interface AgentResult<T = unknown> {
  runId: string;
  /** Text of the last assistant turn */
  finalText: string;
  events: AgentEvent[];
  /** Conversation history after the run */
  turns: readonly Turn[];
  cost: CostSummary;
  durationMs: number;
  stopReason: StopReason;
  /** Validated value; absent when no schema was given or validation failed */
  structuredOutput?: T;
}

export function isSuccess(result: AgentResult): boolean {
  return result.stopReason === "complete";
}

export function toolCalls(result: AgentResult): AgentEventOf<"tool_start">[] {
  return eventsOfType(result.events, "tool_start");
}

export function textChunks(result: AgentResult): string[] {
  return eventsOfType(result.events, "text_chunk").map((event) => event.text);
}

export function costSummary(usage: Usage): CostSummary {
  return {
    input: usage.inputTokens,
    output: usage.outputTokens,
    cached: usage.cachedTokens,
    total: usage.cost,
  };
}
