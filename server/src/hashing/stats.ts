/**
 * Submission latency samples and their on-demand summary.
 */

import type { StatsSnapshot } from "./types.js";

export class StatsAggregator {
  private readonly samples: number[] = [];

  record(durationMicros: number): void {
    if (!Number.isSafeInteger(durationMicros)) {
      throw new RangeError(`durationMicros must be an integer, got ${durationMicros}`);
    }
    this.samples.push(durationMicros);
  }

  snapshot(): StatsSnapshot {
    const total = this.samples.length;
    if (total === 0) return { total: 0, average: 0 };

    let sum = 0;
    for (const sample of this.samples) sum += sample;
    return { total, average: Math.trunc(sum / total) };
  }
}
