/**
 * Structured Logging
 *
 * Usage:
 *
 * ```typescript
 * import { Logger, ConsoleTransport } from "@hashkeep/shared/logging";
 *
 * const logger = new Logger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [new ConsoleTransport()]
 * });
 *
 * logger.info("Listening", { port: 8080 });
 * const routeLog = logger.child({ component: "server.hash.routes" });
 * routeLog.error("Task failed", new Error("boom"), { hashId: 3 });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export { Logger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type ConsoleSink,
  type FileTransportOptions
} from "./transports/index.js";
