import { describe, expect, it } from "vitest";

import { analyzeLayout, canFit, LayoutAnalytics } from "@/lib/fragmentation";
import { findHoles } from "@/lib/fragmentation/layout";
import { sampleWithoutReplacement } from "@/lib/fragmentation/sample";
import type { MemoryUnit } from "@/lib/fragmentation/types";

const MEMORY: MemoryUnit[] = [1, 1, null, null, 2, null, null, null, 3, 3];

describe("analyzeLayout", () => {
  it("summarises used space and holes", () => {
    const stats = analyzeLayout(MEMORY);

    expect(stats.totalUnits).toBe(10);
    expect(stats.usedUnits).toBe(5);
    expect(stats.freeUnits).toBe(5);
    expect(stats.utilPct).toBe(50);
    expect(stats.holes).toEqual([
      { start: 2, end: 3, length: 2 },
      { start: 5, end: 7, length: 3 },
    ]);
    expect(stats.largestFreeRun).toBe(3);
    expect(stats.externalFragmentation).toBeCloseTo(0.4);
  });

  it("reports no fragmentation for fully used or fully free memory", () => {
    expect(analyzeLayout([1, 1, 2, 2]).externalFragmentation).toBe(0);
    expect(analyzeLayout([null, null, null]).externalFragmentation).toBe(0);
  });

  it("answers whether another block fits", () => {
    const stats = analyzeLayout(MEMORY);

    expect(canFit(stats, 3)).toBe(true);
    expect(canFit(stats, 4)).toBe(false);
  });
});

describe("findHoles", () => {
  it("includes a trailing free run", () => {
    expect(findHoles([null, 1, null, null])).toEqual([
      { start: 0, end: 0, length: 1 },
      { start: 2, end: 3, length: 2 },
    ]);
  });

  it("returns nothing for empty memory", () => {
    expect(findHoles([])).toEqual([]);
  });
});

describe("LayoutAnalytics", () => {
  it("answers address-window queries", () => {
    const analytics = new LayoutAnalytics(MEMORY);

    expect(analytics.getRangeStats(4, 8)).toEqual({
      setCount: 2,
      clearCount: 3,
      total: 5,
      longestSetRun: 1,
      longestClearRun: 3,
    });
  });

  it("normalises a reversed window", () => {
    const analytics = new LayoutAnalytics(MEMORY);

    expect(analytics.getRangeStats(3, 0)).toEqual(analytics.getRangeStats(0, 3));
  });
});

describe("sampleWithoutReplacement", () => {
  it("never repeats an item and draws once per pick", () => {
    let calls = 0;
    const picks = sampleWithoutReplacement([10, 20, 30, 40], 3, () => {
      calls += 1;
      return 0.7;
    });

    expect(new Set(picks).size).toBe(3);
    expect(calls).toBe(3);
  });

  it("returns an empty sample when k is zero", () => {
    expect(sampleWithoutReplacement([1, 2], 0, () => 0)).toEqual([]);
  });
});
