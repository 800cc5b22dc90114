import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Prefix lines with a timestamp (default: true) */
  timestamps?: boolean;
}

/**
 * Colors are off for NO_COLOR (https://no-color.org/), CI and non-TTY stderr.
 */
function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined || process.env.CI) {
    return false;
  }
  return Boolean(process.stderr.isTTY);
}

/**
 * Human-readable transport. Everything goes to stderr so stdout stays free
 * for the agent's own output.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
  }

  log(entry: LogEntry): void {
    console.error(this.format(entry));
  }

  format(entry: LogEntry): string {
    const label = `[${entry.level.toUpperCase().padEnd(5)}]`;
    const parts: string[] = [];

    if (this.timestamps) {
      parts.push(`[${entry.timestamp.toISOString().replace("T", " ").slice(0, 19)}]`);
    }
    parts.push(this.useColors ? `${LEVEL_COLORS[entry.level]}${label}${RESET}` : label);

    const scope = entry.context?.logger;
    if (typeof scope === "string") {
      parts.push(`(${scope})`);
    }
    parts.push(entry.message);

    if (entry.data !== undefined) {
      parts.push(typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data));
    }

    return parts.join(" ");
  }
}
