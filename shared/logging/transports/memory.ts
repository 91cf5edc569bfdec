/**
 * Memory Transport
 *
 * Keeps every entry in an array so tests can assert on what was logged.
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: LogEntry[] = [];

  constructor(readonly minLevel: LogLevel = "trace") {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Entries at `level`, optionally under a component prefix such as "server.context" */
  find(level: LogLevel, componentPrefix?: string): LogEntry[] {
    return this.entries.filter(
      e => e.level === level && (componentPrefix === undefined || e.component.startsWith(componentPrefix))
    );
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
