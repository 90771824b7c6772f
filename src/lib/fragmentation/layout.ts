import { BitRangeIndex } from "@/lib/analytics/rangeIndex";
import type { BitRangeStats } from "@/lib/analytics/rangeIndex";
import type { Hole, LayoutStats, MemoryUnit } from "@/lib/fragmentation/types";

export function findHoles(memory: readonly MemoryUnit[]): Hole[] {
  const holes: Hole[] = [];
  let start = -1;

  for (let idx = 0; idx <= memory.length; idx += 1) {
    const free = idx < memory.length && memory[idx] === null;
    if (free && start < 0) {
      start = idx;
    } else if (!free && start >= 0) {
      holes.push({ start, end: idx - 1, length: idx - start });
      start = -1;
    }
  }

  return holes;
}

/** Address-window queries over a memory layout; set bits are used units. */
export class LayoutAnalytics {
  private readonly index: BitRangeIndex;

  constructor(memory: readonly MemoryUnit[]) {
    this.index = new BitRangeIndex(memory.map((unit) => unit !== null));
  }

  get length(): number {
    return this.index.length;
  }

  getRangeStats(l: number, r: number): BitRangeStats {
    return this.index.getRangeStats(l, r);
  }
}

export function analyzeLayout(memory: readonly MemoryUnit[]): LayoutStats {
  const totalUnits = memory.length;
  const whole = new LayoutAnalytics(memory).getRangeStats(0, totalUnits - 1);
  const freeUnits = whole.clearCount;
  const largestFreeRun = whole.longestClearRun;

  return {
    totalUnits,
    usedUnits: whole.setCount,
    freeUnits,
    utilPct: totalUnits > 0 ? (whole.setCount / totalUnits) * 100 : 0,
    holes: findHoles(memory),
    largestFreeRun,
    externalFragmentation: freeUnits > 0 ? 1 - largestFreeRun / freeUnits : 0,
  };
}

export function canFit(stats: LayoutStats, blockSize: number): boolean {
  return blockSize > 0 && stats.largestFreeRun >= blockSize;
}
