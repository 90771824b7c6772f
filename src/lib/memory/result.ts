import type { FrameSlot, PageReplacementResult, ReplacementPolicy, StepRecord } from "@/lib/memory/types";

export function buildResult(policy: ReplacementPolicy, numFrames: number, steps: StepRecord[]): PageReplacementResult {
  const faults = steps.reduce((count, step) => count + (step.fault ? 1 : 0), 0);
  const hits = steps.length - faults;
  return {
    policy,
    numFrames,
    steps,
    faults,
    hits,
    hitRatio: steps.length > 0 ? hits / steps.length : 0,
  };
}

export function emptyFrames(numFrames: number): FrameSlot[] {
  return Array.from({ length: numFrames }, () => null);
}
