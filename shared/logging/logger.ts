/**
 * Core Logger Implementation
 *
 * Fans structured entries out to the configured transports. Child
 * loggers share the parent's transports and only differ in component
 * and correlation id.
 */

import {
  LogLevel,
  LogEntry,
  LoggerConfig,
  ILogger,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS
} from "./types.js";

export class Logger implements ILogger {
  private config: LoggerConfig;
  private redactPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = { ...config };
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message
    };

    if (this.config.correlationId) {
      entry.correlationId = this.config.correlationId;
    }

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        const pending = transport.log(entry);
        if (pending instanceof Promise) {
          pending.catch((e: unknown) => {
            console.error(`[Logger] Transport ${transport.name} failed:`, e);
          });
        }
      } catch (e) {
        // Transport error - console is the last resort
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainObject(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: { component?: string; correlationId?: string }): Logger {
    return new Logger({
      ...this.config,
      redactPatterns: this.redactPatterns,
      component: context.component ?? this.config.component,
      correlationId: context.correlationId ?? this.config.correlationId
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(
      this.config.transports.map(t => (t.flush ? t.flush() : Promise.resolve()))
    );
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(
      this.config.transports.map(t => (t.close ? t.close() : Promise.resolve()))
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
