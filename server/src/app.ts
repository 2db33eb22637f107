/**
 * HTTP Application
 *
 * Builds the hono app around a HashService. Kept apart from the entry
 * point so tests can drive it with `app.request()`.
 */

import { Hono } from "hono";
import { requestId, type RequestIdVariables } from "hono/request-id";
import { nanoid } from "nanoid";
import { HashService } from "./hashing/index.js";
import { createComponentLogger } from "./logging.js";
import { registerHashRoutes } from "./routes/hash.js";
import { registerShutdownRoute } from "./routes/shutdown.js";

export type AppEnv = { Variables: RequestIdVariables };

export interface AppOptions {
  service: HashService;
  /** Invoked by /shutdown; the entry point wires it to the ShutdownController */
  onShutdown?: (reason: string) => void;
}

export function createApp(options: AppOptions): Hono<AppEnv> {
  const log = createComponentLogger("http");
  const app = new Hono<AppEnv>();

  app.use("*", requestId({ generator: () => nanoid(12) }));

  app.use("*", async (c, next) => {
    const startedAt = performance.now();
    await next();
    log.child({ correlationId: c.get("requestId") }).debug("Request handled", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
    });
  });

  registerHashRoutes(app, options.service);
  registerShutdownRoute(app, options.onShutdown ?? (() => {
    log.warn("Shutdown requested but no handler is installed");
  }));

  app.notFound((c) => c.text("Not found.\n", 404));

  app.onError((error, c) => {
    log.child({ correlationId: c.get("requestId") }).error("Unhandled request error", error, {
      method: c.req.method,
      path: c.req.path,
    });
    return c.text("Internal server error.\n", 500);
  });

  return app;
}
