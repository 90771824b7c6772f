import { buildResult, emptyFrames } from "@/lib/memory/result";
import type { FrameSlot, PageRef, PageReplacementResult, StepRecord } from "@/lib/memory/types";

/** Steps until `page` is referenced again after position `t`, or Infinity. */
export function nextUseDistance(refs: readonly PageRef[], t: number, page: PageRef): number {
  for (let i = t + 1; i < refs.length; i += 1) {
    if (refs[i] === page) return i - t - 1;
  }
  return Number.POSITIVE_INFINITY;
}

/**
 * Slot of the resident page used farthest in the future. Ties keep the lowest
 * slot index.
 */
export function chooseOptimalVictim(frames: readonly FrameSlot[], refs: readonly PageRef[], t: number): number {
  let victimSlot = -1;
  let farthest = -1;

  frames.forEach((page, idx) => {
    if (page === null) return;
    const distance = nextUseDistance(refs, t, page);
    if (distance > farthest) {
      farthest = distance;
      victimSlot = idx;
    }
  });

  return victimSlot;
}

export function runOPT(numFrames: number, refs: readonly PageRef[]): PageReplacementResult {
  const frames = emptyFrames(numFrames);
  const steps: StepRecord[] = [];

  refs.forEach((ref, t) => {
    let slot = frames.indexOf(ref);
    const fault = slot < 0;
    let evicted: PageRef | undefined;

    if (fault) {
      slot = frames.indexOf(null);
      if (slot < 0) {
        slot = chooseOptimalVictim(frames, refs, t);
        const victim = frames[slot];
        if (victim === null || victim === undefined) {
          throw new Error("OPT invariant broken: missing victim");
        }
        evicted = victim;
      }
      frames[slot] = ref;
    }

    steps.push({
      t,
      ref,
      fault,
      frames: [...frames],
      slot,
      ...(evicted !== undefined ? { evicted } : {}),
    });
  });

  return buildResult("OPT", numFrames, steps);
}
