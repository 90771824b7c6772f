import { BitRangeIndex } from "@/lib/analytics/rangeIndex";
import type { StepRecord } from "@/lib/memory/types";

export interface TraceRangeStats {
  faults: number;
  hits: number;
  steps: number;
  faultRatePct: number;
  longestFaultStreak: number;
  longestHitStreak: number;
}

function toTraceStats(faults: number, steps: number, longestFaultStreak: number, longestHitStreak: number): TraceRangeStats {
  return {
    faults,
    hits: steps - faults,
    steps,
    faultRatePct: steps > 0 ? (faults / steps) * 100 : 0,
    longestFaultStreak,
    longestHitStreak,
  };
}

export class TraceAnalytics {
  private readonly index: BitRangeIndex;

  constructor(steps: readonly StepRecord[]) {
    this.index = new BitRangeIndex(steps.map((step) => step.fault));
  }

  get length(): number {
    return this.index.length;
  }

  getRangeStats(l: number, r: number): TraceRangeStats {
    const stats = this.index.getRangeStats(l, r);
    return toTraceStats(stats.setCount, stats.total, stats.longestSetRun, stats.longestClearRun);
  }
}

export function buildTraceAnalytics(steps: readonly StepRecord[]): TraceAnalytics {
  return new TraceAnalytics(steps);
}
