/**
 * Logging Types
 *
 * Entries, transports and the logger contract shared by the docprime
 * packages.
 */

// ============================================
// LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/** True when `level` passes a `threshold` */
export function levelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}

// ============================================
// ENTRIES
// ============================================

/** Request-scoped identifiers carried by a logger and stamped on its entries */
export interface LogContext {
  requestId?: string;
  userId?: string;
  sessionId?: string;
}

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  /** Message of the wrapped error, when there is one */
  cause?: string;
}

export interface LogEntry {
  /** ISO-8601 */
  timestamp: string;
  level: LogLevel;
  /** Dotted origin, e.g. "server.context" */
  component: string;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
  error?: SerializedError;
}

// ============================================
// TRANSPORTS
// ============================================

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  write(entry: LogEntry): void | Promise<void>;
  /** Resolve once buffered output has been handed to the OS */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER
// ============================================

export interface LoggerConfig {
  minLevel: LogLevel;
  component: string;
  transports: LogTransport[];
  context?: LogContext;
  /** Keys whose values are replaced before entries reach transports */
  redact?: RegExp[];
  /** Entries kept for getRecentLogs() (default: 500) */
  historySize?: number;
}

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Logger for a sub-component and/or narrower context, sharing transports and history */
  child(options: { component?: string } & LogContext): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
  getRecentLogs(count?: number): LogEntry[];
  flush(): Promise<void>;
}

// ============================================
// REDACTION
// ============================================

export const REDACTED = "[REDACTED]";

export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /api[_-]?key/i,
  /password/i,
  /secret/i,
  /token$/i,
  /^authorization$/i,
  /credential/i,
];
