/**
 * Graceful Shutdown
 *
 * One-way: the first request closes the HTTP server (in-flight requests
 * finish, no new ones are accepted), abandons digests that have not
 * materialized yet, flushes logs and exits. If the server has not closed
 * within the timeout the process exits with code 1.
 */

import type { ILogger } from "@hashkeep/shared/logging";
import { createComponentLogger } from "../logging.js";

export interface ShutdownOptions {
  /** Stop accepting connections and resolve once in-flight requests are done */
  closeServer: () => Promise<void>;
  /** Abandon pending delayed tasks; returns how many were dropped */
  stopTasks: () => number;
  flushLogs: () => Promise<void>;
  exit: (code: number) => void;
  timeoutMs: number;
  log?: ILogger;
}

export class ShutdownController {
  private readonly options: ShutdownOptions;
  private readonly log: ILogger;
  private started = false;
  private exited = false;

  constructor(options: ShutdownOptions) {
    this.options = options;
    this.log = options.log ?? createComponentLogger("shutdown");
  }

  get inProgress(): boolean {
    return this.started;
  }

  /**
   * Begin shutting down. Later calls are ignored.
   */
  request(reason: string): void {
    if (this.started) {
      this.log.debug("Shutdown already in progress", { reason });
      return;
    }
    this.started = true;
    this.log.info("Server is shutting down...", { reason });

    const timer = setTimeout(() => {
      this.log.fatal("Could not gracefully shut down the server", undefined, {
        timeoutMs: this.options.timeoutMs,
      });
      void this.finish(1);
    }, this.options.timeoutMs);

    this.options.closeServer().then(
      () => {
        clearTimeout(timer);
        const abandoned = this.options.stopTasks();
        this.log.info("Server stopped", { abandonedTasks: abandoned });
        void this.finish(0);
      },
      (error: unknown) => {
        clearTimeout(timer);
        this.log.fatal("Could not gracefully shut down the server", error);
        void this.finish(1);
      }
    );
  }

  private async finish(code: number): Promise<void> {
    if (this.exited) return;
    this.exited = true;
    try {
      await this.options.flushLogs();
    } catch (error) {
      console.error("[Shutdown] Failed to flush logs:", error);
    }
    this.options.exit(code);
  }
}
