/**
 * @docprime/shared/logging
 *
 * A process-wide structured logger. The server calls initLogger() once and
 * components take children of it:
 *
 * ```typescript
 * const root = initLogger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [new ConsoleTransport(), new FileTransport({ logDir: "./logs" })],
 * });
 *
 * const cacheLog = root.child({ component: "server.context", sessionId: "s1" });
 * cacheLog.info("Context ready", { estimatedTokens: 812 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  REDACTED,
  isLogLevel,
  levelEnabled,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
  type SerializedError,
} from "./types.js";

export {
  Logger,
  RingBuffer,
  redact,
  serializeError,
  initLogger,
  getLogger,
  log,
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  formatValue,
  type ConsoleTransportOptions,
  type FileTransportOptions,
} from "./transports/index.js";
