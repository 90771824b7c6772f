import { describe, expect, it } from "vitest";

import { runPageReplacement } from "@/lib/memory";
import { describeStep } from "@/lib/sim/stepHeadline";

const { steps } = runPageReplacement([1, 2, 3, 2, 4, 1, 5, 2, 1, 2, 3, 4, 5], 3, "LRU");

describe("describeStep", () => {
  it("narrates a fault into a free frame", () => {
    expect(describeStep(steps[0])).toEqual({
      title: "PAGE FAULT",
      detail: "t=0: page 1 loaded into free frame 1",
      severity: "info",
    });
  });

  it("narrates a hit", () => {
    expect(describeStep(steps[3])).toEqual({
      title: "PAGE HIT",
      detail: "t=3: page 2 already resident in frame 2",
      severity: "success",
    });
  });

  it("narrates an eviction", () => {
    expect(describeStep(steps[4])).toEqual({
      title: "PAGE FAULT + EVICTION",
      detail: "t=4: page 4 replaced page 1 in frame 1",
      severity: "warn",
    });
  });
});
