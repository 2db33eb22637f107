/**
 * hashkeep Server - Main Entry Point
 *
 * Loads configuration, starts the HTTP server and wires orderly
 * shutdown to /shutdown, SIGINT and SIGTERM.
 */

import type { Server } from "net";
import { serve } from "@hono/node-server";
import { loadEnvFile, loadConfig, type ServerConfig } from "./config.js";
import { initServerLogging } from "./logging.js";
import { HashService } from "./hashing/index.js";
import { createApp } from "./app.js";
import { ShutdownController } from "./lifecycle/shutdown.js";

loadEnvFile();

let config: ServerConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(`FATAL: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

const logger = initServerLogging({
  minLevel: config.logLevel,
  logDir: config.logDir,
  json: config.production,
});

const service = new HashService({ delayMs: config.hashDelayMs });

let shutdown: ShutdownController | null = null;
const requestShutdown = (reason: string): void => {
  shutdown?.request(reason);
};

const app = createApp({ service, onShutdown: requestShutdown });

const server: Server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  logger.info("Server is ready to handle requests", {
    address: info.address,
    port: info.port,
    hashDelayMs: config.hashDelayMs,
  });
});

server.on("error", (error: Error) => {
  logger.fatal("Could not listen", error, { host: config.host, port: config.port });
  void logger.close().then(() => process.exit(1), () => process.exit(1));
});

shutdown = new ShutdownController({
  closeServer: () =>
    new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
    }),
  stopTasks: () => service.stop(),
  flushLogs: () => logger.close(),
  exit: (code) => process.exit(code),
  timeoutMs: config.shutdownTimeoutMs,
});

process.on("SIGINT", () => requestShutdown("SIGINT"));
process.on("SIGTERM", () => requestShutdown("SIGTERM"));
