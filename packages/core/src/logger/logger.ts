import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LoggerOptions, LogLevel, LogTransport, Timer } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Structured logger with level filtering, bound context and pluggable transports.
 *
 * A logger without transports is silent, which is what engine components fall
 * back to when the caller does not supply one.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", transports: [new ConsoleTransport()] });
 * const runLogger = logger.child({ runId: "run_1" });
 * runLogger.info("Turn complete", { turn: 2 });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Start measuring a duration; `done()` logs it at debug level.
   */
  startTimer(label: string): Timer {
    const start = performance.now();
    return {
      elapsed: () => performance.now() - start,
      done: (message, data) => {
        const durationMs = performance.now() - start;
        this.log("debug", message ?? `${label} completed`, { ...data, label, durationMs });
        return durationMs;
      },
    };
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  /**
   * Create a logger sharing this logger's transports, with extra bound context.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((t) => t.flush?.()));
  }

  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level) || this.transports.length === 0) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...activeTraceIds(),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}

function activeTraceIds(): { traceId?: string; spanId?: string } {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}
