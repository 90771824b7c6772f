import { describe, expect, it } from "vitest";

import { nextUseDistance, runPageReplacement } from "@/lib/memory";
import { chooseOptimalVictim } from "@/lib/memory/opt";

const REFS = [1, 2, 3, 2, 4, 1, 5, 2, 1, 2, 3, 4, 5];

describe("Optimal replacement", () => {
  it("matches the pinned trace for the classic 13-reference string with 3 frames", () => {
    const result = runPageReplacement(REFS, 3, "OPT");

    expect(result.faults).toBe(7);
    expect(result.steps.map((step) => step.frames)).toEqual([
      [1, null, null],
      [1, 2, null],
      [1, 2, 3],
      [1, 2, 3],
      [1, 2, 4],
      [1, 2, 4],
      [1, 2, 5],
      [1, 2, 5],
      [1, 2, 5],
      [1, 2, 5],
      [3, 2, 5],
      [4, 2, 5],
      [4, 2, 5],
    ]);
    expect(result.steps.map((step) => step.evicted ?? null)).toEqual([
      null, null, null, null, 3, null, 4, null, null, null, 1, 3, null,
    ]);
  });

  it("breaks ties between never-used-again pages by lowest frame index", () => {
    const result = runPageReplacement([1, 2, 3, 4], 3, "OPT");

    expect(result.steps[3].evicted).toBe(1);
    expect(result.steps[3].frames).toEqual([4, 2, 3]);
  });

  it("measures distance over the unprocessed suffix only", () => {
    expect(nextUseDistance([1, 2, 3, 1], 0, 1)).toBe(2);
    expect(nextUseDistance([1, 2, 3, 1], 3, 1)).toBe(Number.POSITIVE_INFINITY);
    expect(nextUseDistance([5, 5], 0, 5)).toBe(0);
  });

  it("picks the slot whose page is used farthest ahead", () => {
    expect(chooseOptimalVictim([7, 8, 9], [0, 9, 7, 8], 0)).toBe(1);
  });
});
