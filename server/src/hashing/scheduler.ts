/**
 * Delayed Task Scheduler
 *
 * One setTimeout per task. Tasks run once, on the event loop, no earlier
 * than their delay; there is no per-task cancellation. `stop()` abandons
 * everything still armed, which is the only way a task does not run.
 */

import type { ILogger } from "@hashkeep/shared/logging";
import { createComponentLogger } from "../logging.js";
import { MAX_TIMER_MS } from "../config.js";

export type ScheduledTask = () => void;

export class DelayedTaskScheduler {
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly log: ILogger;
  private stopped = false;

  constructor(log: ILogger = createComponentLogger("scheduler")) {
    this.log = log;
  }

  /**
   * Run `task` once after `delayMs`. Returns false if the scheduler has
   * been stopped and the task was dropped.
   */
  schedule(delayMs: number, task: ScheduledTask): boolean {
    if (!Number.isInteger(delayMs) || delayMs < 0 || delayMs > MAX_TIMER_MS) {
      throw new RangeError(`delayMs must be an integer in [0, ${MAX_TIMER_MS}], got ${delayMs}`);
    }

    if (this.stopped) {
      this.log.warn("Scheduler stopped, dropping task");
      return false;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        task();
      } catch (error) {
        this.log.error("Scheduled task failed", error);
      }
    }, delayMs);
    this.timers.add(timer);
    return true;
  }

  /** Tasks armed but not yet run */
  get pending(): number {
    return this.timers.size;
  }

  /**
   * Abandon every armed task. Returns how many were dropped.
   */
  stop(): number {
    this.stopped = true;
    const abandoned = this.timers.size;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    if (abandoned > 0) {
      this.log.warn("Abandoned pending tasks", { abandoned });
    }
    return abandoned;
  }
}
