import { describe, expect, it } from "vitest";

import { clampRange } from "@/lib/analytics/rangeIndex";
import { buildTraceAnalytics } from "@/lib/analytics/traceAnalytics";
import { runPageReplacement } from "@/lib/memory";

const RESULT = runPageReplacement([1, 2, 3, 2, 4, 1, 5, 2, 1, 2, 3, 4, 5], 3, "LRU");

describe("TraceAnalytics", () => {
  it("summarises the whole trace", () => {
    const stats = buildTraceAnalytics(RESULT.steps).getRangeStats(0, 12);

    expect(stats.faults).toBe(10);
    expect(stats.hits).toBe(3);
    expect(stats.steps).toBe(13);
    expect(stats.faultRatePct).toBeCloseTo((10 / 13) * 100);
    expect(stats.longestFaultStreak).toBe(4);
    expect(stats.longestHitStreak).toBe(2);
  });

  it("summarises a single hit step", () => {
    expect(buildTraceAnalytics(RESULT.steps).getRangeStats(3, 3)).toEqual({
      faults: 0,
      hits: 1,
      steps: 1,
      faultRatePct: 0,
      longestFaultStreak: 0,
      longestHitStreak: 1,
    });
  });

  it("returns zeros for an empty trace", () => {
    const stats = buildTraceAnalytics([]).getRangeStats(0, 5);

    expect(stats.steps).toBe(0);
    expect(stats.faultRatePct).toBe(0);
  });
});

describe("clampRange", () => {
  it("orders and bounds the ends", () => {
    expect(clampRange({ l: 9, r: -2 }, 5)).toEqual({ l: 0, r: 5 });
  });
});
