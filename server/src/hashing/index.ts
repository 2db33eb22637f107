/**
 * Hashing Module
 *
 * Structure:
 *   transform.ts : SHA-256 + base64
 *   store.ts     : id counter and append-only results
 *   scheduler.ts : one-shot delayed tasks
 *   stats.ts     : submission latency samples
 *   service.ts   : submit / retrieve orchestration
 */

export * from "./types.js";
export { transform } from "./transform.js";
export { ResultStore } from "./store.js";
export { DelayedTaskScheduler, type ScheduledTask } from "./scheduler.js";
export { StatsAggregator } from "./stats.js";
export { HashService, parseHashId, type HashServiceOptions } from "./service.js";
