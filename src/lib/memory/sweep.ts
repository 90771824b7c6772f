import { requireInteger } from "@/lib/errors";
import { runPageReplacement } from "@/lib/memory";
import type { FaultCurvePoint, PageRef, ReplacementPolicy } from "@/lib/memory/types";

export function sweepFrameCounts(
  references: readonly PageRef[],
  policy: ReplacementPolicy,
  maxFrames: number,
): FaultCurvePoint[] {
  requireInteger("maxFrames", maxFrames, 1);
  return Array.from({ length: maxFrames }, (_, idx) => {
    const frames = idx + 1;
    return { frames, faults: runPageReplacement(references, frames, policy).faults };
  });
}

/** True when adding frames ever increased the fault count. */
export function hasBeladyAnomaly(points: readonly FaultCurvePoint[]): boolean {
  const ordered = [...points].sort((a, b) => a.frames - b.frames);
  for (let i = 1; i < ordered.length; i += 1) {
    if (ordered[i].faults > ordered[i - 1].faults) return true;
  }
  return false;
}
