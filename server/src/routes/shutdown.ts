/**
 * Shutdown Route
 *
 * GET|POST /shutdown: ask the process to stop accepting requests and
 * exit once in-flight ones are done.
 */

import type { Hono } from "hono";
import type { AppEnv } from "../app.js";

export function registerShutdownRoute(app: Hono<AppEnv>, requestShutdown: (reason: string) => void): void {
  app.on(["GET", "POST"], "/shutdown", (c) => {
    requestShutdown("http");
    return c.text("Shutting down.\n");
  });
}
