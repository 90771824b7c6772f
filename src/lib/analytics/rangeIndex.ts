import { Fenwick } from "@/lib/dsa/fenwick";
import { SegStreak } from "@/lib/dsa/segStreak";

export interface IndexRange {
  l: number;
  r: number;
}

export interface BitRangeStats {
  setCount: number;
  clearCount: number;
  total: number;
  longestSetRun: number;
  longestClearRun: number;
}

const EMPTY_STATS: BitRangeStats = {
  setCount: 0,
  clearCount: 0,
  total: 0,
  longestSetRun: 0,
  longestClearRun: 0,
};

export function getEmptyBitRangeStats(): BitRangeStats {
  return { ...EMPTY_STATS };
}

function clampIndex(value: number, maxIndex: number): number {
  return Math.max(0, Math.min(Math.floor(value), Math.max(0, maxIndex)));
}

export function clampRange(range: IndexRange, maxIndex: number): IndexRange {
  const left = clampIndex(Math.min(range.l, range.r), maxIndex);
  const right = clampIndex(Math.max(range.l, range.r), maxIndex);
  return { l: left, r: right };
}

/**
 * Counts and longest runs over a fixed-length bit sequence, each answered in
 * O(log n) for any inclusive range.
 */
export class BitRangeIndex {
  private readonly counts: Fenwick;

  private readonly runs: SegStreak;

  constructor(bits: readonly boolean[]) {
    this.counts = Fenwick.fromValues(bits.map((bit) => (bit ? 1 : 0)));
    this.runs = new SegStreak(bits);
  }

  get length(): number {
    return this.counts.size;
  }

  set(index: number, bit: boolean): void {
    this.counts.set(index, bit ? 1 : 0);
    this.runs.update(index, bit);
  }

  countSet(l: number, r: number): number {
    return this.counts.rangeSum(l, r);
  }

  getRangeStats(l: number, r: number): BitRangeStats {
    if (this.length === 0) return getEmptyBitRangeStats();

    const { l: left, r: right } = clampRange({ l, r }, this.length - 1);
    const total = right - left + 1;
    const setCount = this.counts.rangeSum(left, right);
    const node = this.runs.query(left, right);

    return {
      setCount,
      clearCount: total - setCount,
      total,
      longestSetRun: node.bestSet,
      longestClearRun: node.bestClear,
    };
  }
}
