import { BitRangeIndex } from "@/lib/analytics/rangeIndex";
import type { Allocation, AllocationId, MemoryUnit } from "@/lib/fragmentation/types";

/**
 * Contiguous first-fit allocator over a fixed unit range. Occupancy is
 * mirrored in a BitRangeIndex so window checks and the "anything left that
 * fits" test stay logarithmic.
 */
export class FirstFitMemory {
  readonly units: MemoryUnit[];

  private readonly occupancy: BitRangeIndex;

  private nextId: AllocationId = 1;

  constructor(totalUnits: number) {
    this.units = Array.from({ length: totalUnits }, () => null);
    this.occupancy = new BitRangeIndex(this.units.map(() => false));
  }

  get size(): number {
    return this.units.length;
  }

  largestFreeRun(): number {
    return this.occupancy.getRangeStats(0, this.size - 1).longestClearRun;
  }

  /** Lowest start address of `blockSize` free units, or null. */
  findFirstFit(blockSize: number): number | null {
    if (blockSize > this.size || this.largestFreeRun() < blockSize) return null;
    for (let i = 0; i + blockSize <= this.size; i += 1) {
      if (this.occupancy.countSet(i, i + blockSize - 1) === 0) return i;
    }
    return null;
  }

  allocate(blockSize: number): Allocation | null {
    const start = this.findFirstFit(blockSize);
    if (start === null) return null;

    const allocation: Allocation = { id: this.nextId, start, end: start + blockSize - 1 };
    this.nextId += 1;
    this.mark(allocation, allocation.id);
    return allocation;
  }

  free(allocation: Allocation): void {
    this.mark(allocation, null);
  }

  private mark({ start, end }: Allocation, value: MemoryUnit) {
    for (let j = start; j <= end; j += 1) {
      this.units[j] = value;
      this.occupancy.set(j, value !== null);
    }
  }
}
