export { type CreateLoggerOptions, createLogger, createSilentLogger } from "./factory.js";
export { Logger } from "./logger.js";
export { type ConsoleTransportOptions, ConsoleTransport } from "./transports/console.js";
export { type JsonTransportOptions, JsonTransport } from "./transports/json.js";
export { MemoryTransport } from "./transports/memory.js";
export {
  isLogLevel,
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  type LogEntry,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
  type Timer,
} from "./types.js";
