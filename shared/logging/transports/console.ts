/**
 * Console Transport
 *
 * One line per entry in `key=value` form after a short header, e.g.
 *
 *   12:04:05 WARN  server.context  Context build failed  session=s1 durationMs=812
 *
 * `pretty` moves data and error details onto indented lines below the header.
 */

import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  trace: { label: "TRACE", color: ANSI.gray },
  debug: { label: "DEBUG", color: ANSI.cyan },
  info: { label: "INFO ", color: ANSI.green },
  warn: { label: "WARN ", color: ANSI.yellow },
  error: { label: "ERROR", color: ANSI.red },
  fatal: { label: "FATAL", color: ANSI.bold + ANSI.red },
  silent: { label: "     ", color: ANSI.reset },
};

/** Context keys as they appear on the line */
const CONTEXT_KEYS = [
  ["requestId", "req"],
  ["userId", "user"],
  ["sessionId", "session"],
] as const;

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** ANSI colors (default: stdout is a TTY) */
  colors?: boolean;
  /** Multi-line data and stacks (default: false) */
  pretty?: boolean;
  /** Replaces process stdout/stderr; tests pass a collector */
  output?: (line: string, level: LogLevel) => void;
}

function defaultOutput(line: string, level: LogLevel): void {
  const stream = level === "error" || level === "fatal" || level === "warn" ? process.stderr : process.stdout;
  stream.write(line + "\n");
}

/** Renders a value for `key=value`; strings with spaces or quotes are JSON-quoted */
export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export class ConsoleTransport implements LogTransport {
  readonly name = "console";
  readonly minLevel: LogLevel;
  private readonly colors: boolean;
  private readonly pretty: boolean;
  private readonly output: (line: string, level: LogLevel) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.pretty = options.pretty ?? false;
    this.output = options.output || defaultOutput;
  }

  write(entry: LogEntry): void {
    this.output(this.format(entry), entry.level);
  }

  format(entry: LogEntry): string {
    const style = LEVEL_STYLE[entry.level];
    const header = [
      this.paint(entry.timestamp.slice(11, 19), ANSI.dim),
      this.paint(style.label, style.color),
      this.paint(entry.component, ANSI.gray),
      "",
      entry.message,
    ].join(" ");

    const fields: string[] = [];
    for (const [key, label] of CONTEXT_KEYS) {
      const value = entry.context?.[key];
      if (value !== undefined) fields.push(`${label}=${formatValue(value)}`);
    }

    if (this.pretty) {
      const lines = [fields.length > 0 ? `${header}  ${fields.join(" ")}` : header];
      for (const [key, value] of Object.entries(entry.data || {})) {
        lines.push(this.paint(`    ${key}: ${formatValue(value)}`, ANSI.dim));
      }
      if (entry.error) {
        lines.push(this.paint(`    ${entry.error.name}: ${entry.error.message}`, ANSI.red));
        if (entry.error.stack) lines.push(this.paint(entry.error.stack, ANSI.dim));
      }
      return lines.join("\n");
    }

    for (const [key, value] of Object.entries(entry.data || {})) {
      fields.push(`${key}=${formatValue(value)}`);
    }
    if (entry.error) {
      fields.push(`err=${formatValue(`${entry.error.name}: ${entry.error.message}`)}`);
    }
    return fields.length > 0 ? `${header}  ${this.paint(fields.join(" "), ANSI.dim)}` : header;
  }

  private paint(text: string, color: string): string {
    return this.colors ? `${color}${text}${ANSI.reset}` : text;
  }
}
