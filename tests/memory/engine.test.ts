import seedrandom from "seedrandom";
import { describe, expect, it } from "vitest";

import { InvalidConfigurationError } from "@/lib/errors";
import { comparePolicies, parseReferenceSequence, REPLACEMENT_POLICIES, runPageReplacement } from "@/lib/memory";
import type { PageRef, ReplacementPolicy } from "@/lib/memory";
import { hasBeladyAnomaly, sweepFrameCounts } from "@/lib/memory/sweep";

function randomRefs(seed: string, length: number, pages: number): PageRef[] {
  const rng = seedrandom(seed);
  return Array.from({ length }, () => Math.floor(rng() * pages));
}

const SAMPLES = ["a", "b", "c", "d", "e"].map((seed) => randomRefs(seed, 40, 7));

describe("runPageReplacement", () => {
  it("returns an empty trace for an empty sequence", () => {
    for (const policy of REPLACEMENT_POLICIES) {
      const result = runPageReplacement([], 3, policy);
      expect(result.faults).toBe(0);
      expect(result.steps).toEqual([]);
      expect(result.hitRatio).toBe(0);
    }
  });

  it("rejects frame counts below one or non-integers", () => {
    expect(() => runPageReplacement([1], 0, "LRU")).toThrow(InvalidConfigurationError);
    expect(() => runPageReplacement([1], 2.5, "OPT")).toThrow(InvalidConfigurationError);
  });

  it("rejects unknown policies", () => {
    const policy = "FIFO" as ReplacementPolicy;
    expect(() => runPageReplacement([1], 1, policy)).toThrow("Unknown replacement policy: FIFO");
  });

  it("reports the offending field", () => {
    try {
      runPageReplacement([1], -1, "LRU");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.field).toBe("numFrames");
      }
    }
  });

  it.each(REPLACEMENT_POLICIES)("%s fault count equals the number of fault flags", (policy) => {
    for (const refs of SAMPLES) {
      const result = runPageReplacement(refs, 3, policy);
      expect(result.faults).toBe(result.steps.filter((step) => step.fault).length);
      expect(result.steps).toHaveLength(refs.length);
    }
  });

  it.each(REPLACEMENT_POLICIES)("%s faults on the first occurrence of every page", (policy) => {
    for (const refs of SAMPLES) {
      const seen = new Set<PageRef>();
      for (const step of runPageReplacement(refs, 3, policy).steps) {
        if (!seen.has(step.ref)) expect(step.fault).toBe(true);
        seen.add(step.ref);
      }
    }
  });

  it.each(REPLACEMENT_POLICIES)("%s faults once per distinct page when every page fits", (policy) => {
    for (const refs of SAMPLES) {
      const distinct = new Set(refs).size;
      expect(runPageReplacement(refs, distinct, policy).faults).toBe(distinct);
    }
  });

  it("LRU and OPT agree when no eviction is ever needed", () => {
    for (const refs of SAMPLES) {
      const { LRU, OPT } = comparePolicies(refs, 10);
      expect(LRU.faults).toBe(OPT.faults);
      expect(LRU.steps).toEqual(OPT.steps);
    }
  });

  it("never lets OPT exceed LRU", () => {
    for (const refs of SAMPLES) {
      const { LRU, OPT } = comparePolicies(refs, 3);
      expect(OPT.faults).toBeLessThanOrEqual(LRU.faults);
    }
  });

  it("produces identical results on repeated runs", () => {
    for (const policy of REPLACEMENT_POLICIES) {
      expect(runPageReplacement(SAMPLES[0], 4, policy)).toEqual(runPageReplacement(SAMPLES[0], 4, policy));
    }
  });
});

describe("sweepFrameCounts", () => {
  it("counts faults for every frame count up to the limit", () => {
    const curve = sweepFrameCounts([1, 2, 3, 2, 4, 1, 5, 2, 1, 2, 3, 4, 5], "LRU", 5);

    expect(curve.map((point) => point.frames)).toEqual([1, 2, 3, 4, 5]);
    expect(curve[0].faults).toBe(13);
    expect(curve[2].faults).toBe(10);
    expect(curve[4].faults).toBe(5);
  });

  it.each(["OPT", "LRU"] as const)("%s fault count never rises as frames are added", (policy) => {
    for (const refs of SAMPLES) {
      expect(hasBeladyAnomaly(sweepFrameCounts(refs, policy, 8))).toBe(false);
    }
  });

  it("flags a curve where more frames cost more faults", () => {
    expect(
      hasBeladyAnomaly([
        { frames: 4, faults: 10 },
        { frames: 3, faults: 9 },
      ]),
    ).toBe(true);
    expect(hasBeladyAnomaly([])).toBe(false);
  });
});

describe("parseReferenceSequence", () => {
  it("parses comma separated integers with surrounding spaces", () => {
    expect(parseReferenceSequence("1, 2,3 ")).toEqual({ ok: true, refs: [1, 2, 3] });
    expect(parseReferenceSequence("-3, +4")).toEqual({ ok: true, refs: [-3, 4] });
  });

  it.each(["", "1,,2", "1,a", "1.5", "1 2"])("rejects %j", (input) => {
    const parsed = parseReferenceSequence(input);
    expect(parsed.ok).toBe(false);
  });
});
