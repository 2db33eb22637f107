/**
 * Hash Routes
 *
 * POST /hash       : submit a password, answer with its hash id
 * GET  /hash/:id   : the encoded digest, or a 400 explaining why not
 * GET  /stats      : submission count and average handling time (µs)
 */

import type { Context, Hono, MiddlewareHandler } from "hono";
import type { AppEnv } from "../app.js";
import type { HashService } from "../hashing/index.js";
import { createComponentLogger } from "../logging.js";

const SUBMIT_PATHS = ["/hash", "/hash/"] as const;

export function registerHashRoutes(app: Hono<AppEnv>, service: HashService): void {
  const log = createComponentLogger("hash.routes");

  // Measures the synchronous part of a submission only; the digest
  // itself is computed later by the scheduler.
  const timeSubmission: MiddlewareHandler<AppEnv> = async (c, next) => {
    const startedAt = performance.now();
    await next();
    if (c.res.status === 200) {
      service.recordDuration(Math.round((performance.now() - startedAt) * 1000));
    }
  };

  // ----------------------------------------
  // Submit
  // ----------------------------------------

  for (const path of SUBMIT_PATHS) {
    app.post(path, timeSubmission, async (c) => {
      let password: string;
      try {
        password = await readPassword(c);
      } catch (error) {
        log.warn("Unable to parse form", { error: String(error) });
        return c.text("Unable to parse form.\n", 400);
      }

      const id = service.submit(password);
      return c.text(String(id));
    });
  }

  // ----------------------------------------
  // Retrieve
  // ----------------------------------------

  const retrieve = (c: Context<AppEnv>, segment: string | undefined): Response => {
    const result = service.retrieve(segment);
    if (!result.ok) {
      return c.text(`${result.message}\n`, 400);
    }
    return c.text(result.value);
  };

  app.get("/hash", (c) => retrieve(c, undefined));
  app.get("/hash/", (c) => retrieve(c, undefined));
  app.get("/hash/:id{.+}", (c) => retrieve(c, c.req.param("id")));

  // ----------------------------------------
  // Stats
  // ----------------------------------------

  app.get("/stats", (c) => {
    try {
      return c.json(service.getStats());
    } catch (error) {
      log.error("Failed to serialize stats", error);
      return c.body(null, 500);
    }
  });
}

/**
 * The first `password` value of the form body, falling back to the
 * query string. Absent means empty, not an error.
 */
async function readPassword(c: Context<AppEnv>): Promise<string> {
  const body = await c.req.parseBody({ all: true });
  const fromBody = firstString(body["password"]);
  if (fromBody !== undefined) return fromBody;
  return c.req.query("password") ?? "";
}

function firstString(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first: unknown = value.find((v) => typeof v === "string");
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}
