import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel, LogTransport } from "./types.js";

export interface CreateLoggerOptions {
  /** Logger name, bound into every entry's context (default: 'helmsman') */
  name?: string;
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Emit JSON lines instead of human-readable text */
  json?: boolean;
  colors?: boolean;
  /** Extra transports appended after the console one */
  transports?: LogTransport[];
}

/**
 * Build a logger with the usual transports.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "agent", level: "debug" });
 * const quiet = createLogger({ console: false, transports: [new MemoryTransport()] });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const transports: LogTransport[] = [];

  if (options.console ?? true) {
    transports.push(options.json ? new JsonTransport() : new ConsoleTransport({ colors: options.colors }));
  }
  transports.push(...(options.transports ?? []));

  return new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "helmsman" },
    transports,
  });
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: "fatal" });
}
