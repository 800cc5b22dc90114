import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Line sink (default: writes to stderr) */
  output?: (line: string) => void;
}

/**
 * One JSON object per line, for log shippers.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const transport = new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2026-01-01T00:00:00.000Z","level":"info","message":"Run started"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(entry: LogEntry): void {
    const record: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
      message: entry.message,
    };

    if (entry.context) {
      record.context = entry.context;
    }
    if (entry.data !== undefined) {
      record.data = entry.data;
    }
    if (entry.traceId) {
      record.traceId = entry.traceId;
      record.spanId = entry.spanId;
    }

    this.output(JSON.stringify(record));
  }
}
