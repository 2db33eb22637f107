/**
 * Tests for the shared Logger and ConsoleTransport
 */

import { describe, it, expect, vi } from "vitest";
import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogEntry, LogLevel, LogTransport } from "./types.js";

class MemoryTransport implements LogTransport {
  name = "memory";
  entries: LogEntry[] = [];
  constructor(public minLevel: LogLevel = "trace") {}
  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: "2024-03-01T12:34:56.789Z",
    level: "info",
    component: "server.hash",
    message: "Digest ready",
    ...overrides,
  };
}

describe("Logger", () => {
  it("drops entries below the logger's minimum level", () => {
    const memory = new MemoryTransport();
    const logger = new Logger({ minLevel: "info", component: "server", transports: [memory] });

    logger.debug("hidden");
    logger.info("shown");

    expect(memory.entries.map(e => e.message)).toEqual(["shown"]);
  });

  it("respects each transport's own minimum level", () => {
    const everything = new MemoryTransport("trace");
    const errorsOnly = new MemoryTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [everything, errorsOnly] });

    logger.warn("careful");
    logger.error("broken");

    expect(everything.entries).toHaveLength(2);
    expect(errorsOnly.entries.map(e => e.message)).toEqual(["broken"]);
  });

  it("redacts sensitive keys, including nested ones", () => {
    const memory = new MemoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [memory] });

    logger.info("form", { password: "test-secret", hashId: 4, form: { apiToken: "x", field: "ok" } });

    expect(memory.entries[0].data).toEqual({
      password: "[REDACTED]",
      hashId: 4,
      form: { apiToken: "[REDACTED]", field: "ok" },
    });
  });

  it("records error details", () => {
    const memory = new MemoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [memory] });

    logger.error("failed", new RangeError("bad delay"));
    logger.error("failed again", "plain string");

    expect(memory.entries[0].error?.name).toBe("RangeError");
    expect(memory.entries[0].error?.message).toBe("bad delay");
    expect(memory.entries[1].error).toEqual({ name: "Unknown", message: "plain string" });
  });

  it("child loggers carry component and correlation id", () => {
    const memory = new MemoryTransport();
    const logger = new Logger({ minLevel: "trace", component: "server", transports: [memory] });

    const child = logger.child({ component: "server.http" }).child({ correlationId: "req-1" });
    child.info("handled");

    expect(memory.entries[0].component).toBe("server.http");
    expect(memory.entries[0].correlationId).toBe("req-1");
  });

  it("keeps logging when a transport throws", () => {
    const memory = new MemoryTransport();
    const broken: LogTransport = {
      name: "broken",
      minLevel: "trace",
      log: () => {
        throw new Error("disk full");
      },
    };
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = new Logger({ minLevel: "trace", component: "server", transports: [broken, memory] });
    logger.info("still here");

    expect(memory.entries.map(e => e.message)).toEqual(["still here"]);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});

describe("ConsoleTransport", () => {
  it("formats a plain line", () => {
    const transport = new ConsoleTransport({ colors: false });
    expect(transport.format(entry({ correlationId: "abc123", data: { hashId: 7 } })))
      .toBe('12:34:56 INF [server.hash] (abc123) Digest ready {"hashId":7}');
  });

  it("writes JSON lines to the sink in json mode", () => {
    const lines: [LogLevel, string][] = [];
    const transport = new ConsoleTransport({ json: true, sink: (level, line) => lines.push([level, line]) });

    const e = entry({ level: "warn" });
    transport.log(e);

    expect(lines).toEqual([["warn", JSON.stringify(e)]]);
  });

  it("appends error name and message", () => {
    const transport = new ConsoleTransport({ colors: false });
    const line = transport.format(entry({ level: "error", error: { name: "Error", message: "boom" } }));
    expect(line).toBe("12:34:56 ERR [server.hash] Digest ready\nError: boom");
  });
});
