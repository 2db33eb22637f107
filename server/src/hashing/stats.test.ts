import { describe, it, expect } from "vitest";
import { StatsAggregator } from "./stats.js";

describe("hashing/stats", () => {
  it("reports zeros before any sample", () => {
    expect(new StatsAggregator().snapshot()).toEqual({ total: 0, average: 0 });
  });

  it("truncates the average", () => {
    const stats = new StatsAggregator();
    stats.record(10);
    stats.record(11);
    stats.record(12);
    stats.record(12);

    // 45 / 4 = 11.25
    expect(stats.snapshot()).toEqual({ total: 4, average: 11 });
  });

  it("truncates toward zero for negative sums", () => {
    const stats = new StatsAggregator();
    stats.record(-3);
    stats.record(-4);

    // -7 / 2 = -3.5
    expect(stats.snapshot()).toEqual({ total: 2, average: -3 });
  });

  it("rejects non-integer samples", () => {
    const stats = new StatsAggregator();
    expect(() => stats.record(1.5)).toThrow(RangeError);
    expect(() => stats.record(Number.NaN)).toThrow(RangeError);
    expect(stats.snapshot().total).toBe(0);
  });

  it("snapshots are independent of later samples", () => {
    const stats = new StatsAggregator();
    stats.record(100);
    const before = stats.snapshot();
    stats.record(300);

    expect(before).toEqual({ total: 1, average: 100 });
    expect(stats.snapshot()).toEqual({ total: 2, average: 200 });
  });
});
