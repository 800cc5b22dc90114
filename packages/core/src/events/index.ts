export {
  type AgentEvent,
  type AgentEventInput,
  type AgentEventOf,
  type AgentEventType,
  type CostSummary,
  eventsOfType,
  isEventOfType,
  stampEvent,
} from "./agent-events.js";
export { DEFAULT_STREAM_CAPACITY, EventStream, type EventStreamOptions } from "./stream.js";
