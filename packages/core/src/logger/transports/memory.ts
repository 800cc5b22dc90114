import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Keeps entries in memory. Used by tests and by callers that want to inspect
 * what the engine reported after a run.
 */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
