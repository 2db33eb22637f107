/**
 * Console Transport
 *
 * Human-readable, color-coded lines for development, or one JSON object
 * per line when running under a log collector.
 */

import { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// COLOR CODES (ANSI)
// ============================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export type ConsoleSink = (level: LogLevel, line: string) => void;

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Use colors (default: only when stdout is a TTY) */
  colors?: boolean;
  /** Emit JSON lines instead of formatted text (default: false) */
  json?: boolean;
  /** Destination for formatted lines (default: the matching console method) */
  sink?: ConsoleSink;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private json: boolean;
  private sink: ConsoleSink;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.json = options.json ?? false;
    this.colors = !this.json && (options.colors ?? process.stdout.isTTY === true);
    this.sink = options.sink ?? writeToConsole;
  }

  log(entry: LogEntry): void {
    this.sink(entry.level, this.json ? JSON.stringify(entry) : this.format(entry));
  }

  format(entry: LogEntry): string {
    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const parts = [
      this.colorize(time, COLORS.dim),
      this.colorize(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]),
      this.colorize(`[${entry.component}]`, COLORS.magenta),
    ];

    if (entry.correlationId) {
      parts.push(this.colorize(`(${entry.correlationId})`, COLORS.dim));
    }

    parts.push(entry.message);

    let output = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      output += " " + this.colorize(JSON.stringify(entry.data), COLORS.dim);
    }

    if (entry.error) {
      output += "\n" + this.colorize(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.stack) {
        output += "\n" + this.colorize(entry.error.stack, COLORS.dim);
      }
    }

    return output;
  }

  private colorize(text: string, color: string): string {
    if (!this.colors) return text;
    return `${color}${text}${COLORS.reset}`;
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
    case "fatal":
      console.error(line);
      break;
    case "silent":
      break;
  }
}
