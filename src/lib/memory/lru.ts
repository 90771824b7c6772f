import { RecencyTrack } from "@/lib/memory/recency";
import { buildResult, emptyFrames } from "@/lib/memory/result";
import type { PageRef, PageReplacementResult, StepRecord } from "@/lib/memory/types";

export function runLRU(numFrames: number, refs: readonly PageRef[]): PageReplacementResult {
  const frames = emptyFrames(numFrames);
  const recency = new RecencyTrack();
  const steps: StepRecord[] = [];

  refs.forEach((ref, t) => {
    let slot = frames.indexOf(ref);
    const fault = slot < 0;
    let evicted: PageRef | undefined;

    if (!fault) {
      recency.touch(ref);
    } else {
      slot = frames.indexOf(null);
      if (slot < 0) {
        const victim = recency.popFront();
        if (victim === null) {
          throw new Error("LRU invariant broken: missing victim");
        }
        slot = frames.indexOf(victim);
        evicted = victim;
      }

      frames[slot] = ref;
      recency.remove(ref);
      recency.touch(ref);
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

  return buildResult("LRU", numFrames, steps);
}
