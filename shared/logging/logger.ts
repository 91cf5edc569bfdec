/**
 * Logger
 *
 * Builds structured entries, redacts sensitive keys and hands each entry to
 * every transport whose level admits it. A bounded in-memory history backs
 * getRecentLogs().
 */

import {
  DEFAULT_REDACT_PATTERNS,
  REDACTED,
  levelEnabled,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
  type SerializedError,
} from "./types.js";

const DEFAULT_HISTORY_SIZE = 500;

// ============================================
// HISTORY
// ============================================

/** Fixed-capacity ring; the oldest item is overwritten when full. */
export class RingBuffer<T> {
  private slots: T[] = [];
  private next = 0;

  constructor(readonly capacity: number) {}

  push(item: T): void {
    this.slots[this.next] = item;
    this.next = (this.next + 1) % this.capacity;
  }

  /** Oldest first */
  toArray(): T[] {
    if (this.slots.length < this.capacity) return [...this.slots];
    return this.slots.slice(this.next).concat(this.slots.slice(0, this.next));
  }

  last(n: number): T[] {
    return n <= 0 ? [] : this.toArray().slice(-n);
  }

  get size(): number {
    return this.slots.length;
  }

  clear(): void {
    this.slots = [];
    this.next = 0;
  }
}

// ============================================
// HELPERS
// ============================================

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

export function redact(data: Record<string, unknown>, patterns: RegExp[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (patterns.some(p => p.test(key))) {
      out[key] = REDACTED;
    } else {
      out[key] = isPlainRecord(value) ? redact(value, patterns) : value;
    }
  }
  return out;
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: "NonError", message: String(error) };
  }
  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };
  if (error.cause !== undefined) {
    serialized.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
  }
  return serialized;
}

function compactContext(context: LogContext): LogContext | undefined {
  const out: LogContext = {};
  if (context.requestId !== undefined) out.requestId = context.requestId;
  if (context.userId !== undefined) out.userId = context.userId;
  if (context.sessionId !== undefined) out.sessionId = context.sessionId;
  return Object.keys(out).length > 0 ? out : undefined;
}

// ============================================
// LOGGER
// ============================================

export class Logger implements ILogger {
  private readonly history: RingBuffer<LogEntry>;
  private readonly patterns: RegExp[];

  constructor(private readonly config: LoggerConfig, history?: RingBuffer<LogEntry>) {
    this.history = history || new RingBuffer(config.historySize || DEFAULT_HISTORY_SIZE);
    this.patterns = config.redact || DEFAULT_REDACT_PATTERNS;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.emit("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.emit("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.emit("fatal", message, data, error);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelEnabled(level, this.config.minLevel);
  }

  child(options: { component?: string } & LogContext): ILogger {
    const { component, ...context } = options;
    return new Logger(
      {
        ...this.config,
        component: component || this.config.component,
        context: { ...this.config.context, ...context },
      },
      this.history
    );
  }

  getRecentLogs(count = 100): LogEntry[] {
    return this.history.last(count);
  }

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }

  private emit(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
    };
    const context = compactContext(this.config.context || {});
    if (context) entry.context = context;
    if (data) entry.data = redact(data, this.patterns);
    if (error !== undefined) entry.error = serializeError(error);

    this.history.push(entry);

    for (const transport of this.config.transports) {
      if (!levelEnabled(level, transport.minLevel)) continue;
      try {
        const pending = transport.write(entry);
        if (pending) {
          pending.catch((err: unknown) => reportTransportFailure(transport.name, err));
        }
      } catch (err) {
        reportTransportFailure(transport.name, err);
      }
    }
  }
}

/** Last resort when a transport itself fails */
function reportTransportFailure(name: string, err: unknown): void {
  console.error(`[logging] transport "${name}" failed:`, err);
}

// ============================================
// PROCESS-WIDE LOGGER
// ============================================

let rootLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  rootLogger = new Logger(config);
  return rootLogger;
}

export function getLogger(): Logger {
  if (!rootLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return rootLogger;
}

/** Shorthand for getLogger() */
export function log(): Logger {
  return getLogger();
}
