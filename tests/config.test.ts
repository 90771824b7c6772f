import { describe, expect, it } from "vitest";

import { clampToLimit, FRAGMENTATION_LIMITS, PAGING_LIMITS } from "@/lib/config";
import { getAllocationColor, getPageColor, EMPTY_FRAME_COLOR, FREE_UNIT_COLOR } from "@/lib/colors";

describe("clampToLimit", () => {
  it("snaps onto the step grid", () => {
    expect(clampToLimit(123, FRAGMENTATION_LIMITS.totalMemory)).toBe(120);
    expect(clampToLimit(7, FRAGMENTATION_LIMITS.blockSize)).toBe(5);
    expect(clampToLimit(8, FRAGMENTATION_LIMITS.blockSize)).toBe(10);
  });

  it("bounds out-of-range and non-numeric input", () => {
    expect(clampToLimit(1000, FRAGMENTATION_LIMITS.totalMemory)).toBe(500);
    expect(clampToLimit(Number.NaN, FRAGMENTATION_LIMITS.totalMemory)).toBe(50);
    expect(clampToLimit(0, PAGING_LIMITS.numFrames)).toBe(1);
  });
});

describe("colors", () => {
  it("uses the reserved colors for free units and empty frames", () => {
    expect(getAllocationColor(null)).toBe(FREE_UNIT_COLOR);
    expect(getPageColor(null)).toBe(EMPTY_FRAME_COLOR);
  });

  it("gives neighbouring allocations different colors", () => {
    expect(getAllocationColor(1)).toBe("#38bdf8");
    expect(getAllocationColor(2)).toBe("#f59e0b");
    expect(getAllocationColor(11)).toBe("#38bdf8");
  });

  it("handles negative page ids", () => {
    expect(getPageColor(-1)).toBe("#34d399");
  });
});
