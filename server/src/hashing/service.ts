/**
 * Hash Service
 *
 * Orchestrates a submission (reserve an id, arm the delayed digest,
 * hand the id back) and a retrieval (classify the requested id against
 * the store). The store, scheduler and stats are injected so each test
 * and each server instance gets its own state.
 */

import type { ILogger } from "@hashkeep/shared/logging";
import { createComponentLogger } from "../logging.js";
import { DEFAULT_HASH_DELAY_MS } from "../config.js";
import { ResultStore } from "./store.js";
import { DelayedTaskScheduler } from "./scheduler.js";
import { StatsAggregator } from "./stats.js";
import { transform } from "./transform.js";
import {
  RETRIEVE_ERROR_MESSAGES,
  type RetrieveErrorCode,
  type RetrieveResult,
  type StatsSnapshot,
} from "./types.js";

export interface HashServiceOptions {
  store?: ResultStore;
  scheduler?: DelayedTaskScheduler;
  stats?: StatsAggregator;
  /** Delay before a submission's digest becomes retrievable */
  delayMs?: number;
  log?: ILogger;
}

export class HashService {
  readonly store: ResultStore;
  readonly scheduler: DelayedTaskScheduler;
  readonly stats: StatsAggregator;
  readonly delayMs: number;
  private readonly log: ILogger;

  constructor(options: HashServiceOptions = {}) {
    this.log = options.log ?? createComponentLogger("hash");
    this.store = options.store ?? new ResultStore();
    this.scheduler = options.scheduler ?? new DelayedTaskScheduler(this.log.child({ component: "server.scheduler" }));
    this.stats = options.stats ?? new StatsAggregator();
    this.delayMs = options.delayMs ?? DEFAULT_HASH_DELAY_MS;
  }

  // ----------------------------------------
  // Submission
  // ----------------------------------------

  /**
   * Reserve an id for `password` and arm its digest. Returns immediately;
   * the digest lands in the store after `delayMs`.
   */
  submit(password: string): number {
    const data = Buffer.from(password, "utf8");
    const id = this.store.reserve();

    this.scheduler.schedule(this.delayMs, () => {
      if (!this.store.complete(id, transform(data))) {
        this.log.warn("Digest already recorded", { hashId: id });
        return;
      }
      this.log.debug("Digest ready", { hashId: id });
    });

    this.log.debug("Submission accepted", { hashId: id, delayMs: this.delayMs });
    return id;
  }

  // ----------------------------------------
  // Retrieval
  // ----------------------------------------

  /**
   * Look up the raw id segment of a retrieval request.
   */
  retrieve(segment: string | undefined): RetrieveResult {
    if (!segment) return fail("missing_id");

    const id = parseHashId(segment);
    if (id === null) return fail("invalid_id");

    const result = this.store.get(id);
    switch (result.status) {
      case "found":
        return { ok: true, value: result.value };
      case "pending":
        return fail("not_ready");
      case "out_of_range":
        return fail("out_of_range");
    }
  }

  // ----------------------------------------
  // Stats
  // ----------------------------------------

  recordDuration(durationMicros: number): void {
    this.stats.record(durationMicros);
  }

  getStats(): StatsSnapshot {
    return this.stats.snapshot();
  }

  /**
   * Drop every digest that has not materialized yet.
   */
  stop(): number {
    return this.scheduler.stop();
  }
}

/**
 * Decimal integer with an optional sign. Returns null for anything else,
 * including values beyond the safe integer range.
 */
export function parseHashId(segment: string): number | null {
  if (!/^[+-]?\d+$/.test(segment)) return null;
  const id = Number(segment);
  return Number.isSafeInteger(id) ? id : null;
}

function fail(code: RetrieveErrorCode): RetrieveResult {
  return { ok: false, code, message: RETRIEVE_ERROR_MESSAGES[code] };
}
