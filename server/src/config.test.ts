import { describe, it, expect } from "vitest";
import { loadConfig, parseListenAddr, ConfigError } from "./config.js";

describe("config", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      host: undefined,
      port: 8080,
      hashDelayMs: 5000,
      shutdownTimeoutMs: 30000,
      logLevel: "debug",
      logDir: undefined,
      production: false,
    });
  });

  it("switches the default log level in production", () => {
    expect(loadConfig({ NODE_ENV: "production" })).toMatchObject({ logLevel: "info", production: true });
  });

  it("reads every variable", () => {
    expect(loadConfig({
      LISTEN_ADDR: "127.0.0.1:9000",
      HASH_DELAY_MS: "250",
      SHUTDOWN_TIMEOUT_MS: "1000",
      LOG_LEVEL: "warn",
      LOG_DIR: "/tmp/hashkeep",
    })).toEqual({
      host: "127.0.0.1",
      port: 9000,
      hashDelayMs: 250,
      shutdownTimeoutMs: 1000,
      logLevel: "warn",
      logDir: "/tmp/hashkeep",
      production: false,
    });
  });

  it("names the variable that is malformed", () => {
    expect(() => loadConfig({ HASH_DELAY_MS: "5s" })).toThrow(ConfigError);
    expect(() => loadConfig({ HASH_DELAY_MS: "5s" })).toThrow(/^HASH_DELAY_MS: /);
    expect(() => loadConfig({ SHUTDOWN_TIMEOUT_MS: "-1" })).toThrow(/^SHUTDOWN_TIMEOUT_MS: /);
    expect(() => loadConfig({ HASH_DELAY_MS: "2147483648" })).toThrow(/^HASH_DELAY_MS: must not exceed/);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow('LOG_LEVEL: unknown level "loud"');
  });
});

describe("parseListenAddr", () => {
  it("accepts :port, host:port, bare port and bracketed IPv6", () => {
    expect(parseListenAddr(":8080")).toEqual({ host: undefined, port: 8080 });
    expect(parseListenAddr("localhost:3000")).toEqual({ host: "localhost", port: 3000 });
    expect(parseListenAddr("4000")).toEqual({ host: undefined, port: 4000 });
    expect(parseListenAddr("[::1]:8081")).toEqual({ host: "::1", port: 8081 });
  });

  it("rejects bad ports", () => {
    expect(() => parseListenAddr("localhost")).toThrow("LISTEN_ADDR: invalid port in \"localhost\"");
    expect(() => parseListenAddr(":70000")).toThrow(ConfigError);
    expect(() => parseListenAddr("host:")).toThrow(ConfigError);
  });
});
