/**
 * Logging Setup for the Hash Server
 *
 * Initializes the shared logger with a console transport and, when a
 * log directory is configured, a rotating file transport.
 */

import {
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@hashkeep/shared/logging";

export interface LoggingOptions {
  /** Minimum console level (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Write JSON-lines files here as well as to the console */
  logDir?: string;
  /** Console output as JSON lines (default: in production) */
  json?: boolean;
}

let logger: Logger | null = null;

/**
 * Initialize the logging system for the server.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isProd = process.env.NODE_ENV === "production";
  const minLevel = options.minLevel ?? (isProd ? "info" : "debug");

  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel, json: options.json ?? isProd })
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: minLevel === "silent" ? "silent" : "debug",
      logDir: options.logDir,
      filename: "server"
    }));
  }

  logger = new Logger({ minLevel, component: "server", transports });
  return logger;
}

/**
 * Get the server logger, initializing it from the environment if the
 * entry point has not done so yet (tests, scripts).
 */
export function getServerLogger(): Logger {
  if (!logger) {
    const level = process.env.LOG_LEVEL;
    return initServerLogging({
      minLevel: level && isLogLevel(level) ? level : undefined,
      logDir: process.env.LOG_DIR || undefined
    });
  }
  return logger;
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getServerLogger().child({ component: `server.${component}` });
}
