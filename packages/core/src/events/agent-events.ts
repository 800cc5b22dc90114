// ============================================
// Agent Events
// ============================================

import type { StopReason } from "../agent/state.js";
import type { Turn } from "../provider/types.js";

/**
 * Cost of a run, as reported on the final `stop` event and in results.
 */
export interface CostSummary {
  input: number;
  output: number;
  cached: number;
  /** USD */
  total: number;
}

/**
 * Everything a run reports, in order. Tagged by `type`.
 */
export type AgentEvent =
  | { type: "start"; task: string; timestamp: Date }
  | { type: "text_chunk"; text: string; timestamp: Date }
  | { type: "text_complete"; text: string; timestamp: Date }
  | { type: "tool_start"; requestId: string; toolName: string; toolInput: unknown; timestamp: Date }
  | {
      type: "tool_end";
      requestId: string;
      toolName: string;
      result?: unknown;
      error?: string;
      timestamp: Date;
    }
  | { type: "turn_complete"; turn: Turn; turnNumber: number; timestamp: Date }
  | { type: "warning"; message: string; details?: Record<string, unknown>; timestamp: Date }
  | { type: "stop"; reason: StopReason; totalTurns: number; cost: CostSummary; timestamp: Date };

export type AgentEventType = AgentEvent["type"];

export type AgentEventOf<T extends AgentEventType> = Extract<AgentEvent, { type: T }>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event before it is stamped */
export type AgentEventInput = DistributiveOmit<AgentEvent, "timestamp">;

export function stampEvent(event: AgentEventInput, timestamp: Date = new Date()): AgentEvent {
  return { ...event, timestamp };
}

export function isEventOfType<T extends AgentEventType>(event: AgentEvent, type: T): event is AgentEventOf<T> {
  return event.type === type;
}

/**
 * @example
 * ```typescript
 * const warnings = eventsOfType(result.events, "warning").map((e) => e.message);
 * ```
 */
export function eventsOfType<T extends AgentEventType>(
  events: readonly AgentEvent[],
  type: T
): AgentEventOf<T>[] {
  return events.filter((event): event is AgentEventOf<T> => isEventOfType(event, type));
}
