/**
 * Server Configuration
 *
 * Reads the environment (optionally seeded from the repository's .env)
 * into a typed config object. `loadConfig` never touches process state,
 * so it can be exercised with a plain object.
 */

import { config as loadDotenv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@hashkeep/shared/logging";

// ============================================
// DEFAULTS
// ============================================

export const DEFAULT_LISTEN_ADDR = ":8080";
export const DEFAULT_HASH_DELAY_MS = 5_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;

/** Largest delay setTimeout honors (~24.8 days) */
export const MAX_TIMER_MS = 2_147_483_647;

export interface ServerConfig {
  /** Interface to bind; undefined means all interfaces */
  host?: string;
  port: number;
  hashDelayMs: number;
  shutdownTimeoutMs: number;
  logLevel: LogLevel;
  logDir?: string;
  production: boolean;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

/**
 * Load .env from the repository root into process.env. Variables that
 * are already set win.
 */
export function loadEnvFile(): void {
  const here = dirname(fileURLToPath(import.meta.url));
  loadDotenv({ path: resolve(here, "../../.env") });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const production = env.NODE_ENV === "production";
  const { host, port } = parseListenAddr(env.LISTEN_ADDR || DEFAULT_LISTEN_ADDR);

  const logLevel = env.LOG_LEVEL || (production ? "info" : "debug");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("LOG_LEVEL", `unknown level "${logLevel}"`);
  }

  return {
    host,
    port,
    hashDelayMs: parseMillis("HASH_DELAY_MS", env.HASH_DELAY_MS, DEFAULT_HASH_DELAY_MS),
    shutdownTimeoutMs: parseMillis("SHUTDOWN_TIMEOUT_MS", env.SHUTDOWN_TIMEOUT_MS, DEFAULT_SHUTDOWN_TIMEOUT_MS),
    logLevel,
    logDir: env.LOG_DIR || undefined,
    production,
  };
}

/**
 * Accepts "host:port", ":port" or a bare port.
 */
export function parseListenAddr(value: string): { host?: string; port: number } {
  const colon = value.lastIndexOf(":");
  const hostPart = colon === -1 ? "" : value.slice(0, colon);
  const portPart = colon === -1 ? value : value.slice(colon + 1);

  if (!/^\d+$/.test(portPart) || Number(portPart) > 65_535) {
    throw new ConfigError("LISTEN_ADDR", `invalid port in "${value}"`);
  }

  // [::1]:8080
  const host = hostPart.replace(/^\[(.*)\]$/, "$1");
  return { host: host || undefined, port: Number(portPart) };
}

function parseMillis(variable: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(variable, `expected a non-negative integer of milliseconds, got "${raw}"`);
  }
  const ms = Number(raw);
  if (ms > MAX_TIMER_MS) {
    throw new ConfigError(variable, `must not exceed ${MAX_TIMER_MS}`);
  }
  return ms;
}
