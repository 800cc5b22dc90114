/**
 * Log severity levels in ascending order of importance.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * A single log entry with metadata.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Bound context (logger name, run id, agent name) */
  context?: Record<string, unknown>;
  /** Per-call payload */
  data?: unknown;
  /** OpenTelemetry trace ID (when within an active span) */
  traceId?: string;
  /** OpenTelemetry span ID (when within an active span) */
  spanId?: string;
}

/**
 * Output destination for log entries.
 */
export interface LogTransport {
  log(entry: LogEntry): void;
  flush?(): Promise<void>;
  dispose?(): void;
}

export interface LoggerOptions {
  /** Minimum level to log (default: 'info') */
  level?: LogLevel;
  context?: Record<string, unknown>;
  transports?: LogTransport[];
}

/**
 * Handle returned by {@link Logger.startTimer}.
 */
export interface Timer {
  /** Milliseconds elapsed so far */
  elapsed(): number;
  /** Log the elapsed time at debug level and return it */
  done(message?: string, data?: Record<string, unknown>): number;
}
