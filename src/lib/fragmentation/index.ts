import seedrandom from "seedrandom";

import { requireInteger } from "@/lib/errors";
import { FirstFitMemory } from "@/lib/fragmentation/firstFit";
import { sampleWithoutReplacement } from "@/lib/fragmentation/sample";
import type { Allocation, AllocationId, FragmentationResult, RandomSource } from "@/lib/fragmentation/types";

export * from "@/lib/fragmentation/types";
export { analyzeLayout, canFit, LayoutAnalytics } from "@/lib/fragmentation/layout";

export function createRandomSource(seed: string): RandomSource {
  return seedrandom(seed);
}

export function runFragmentation(
  totalMemory: number,
  blockSize: number,
  numAllocs: number,
  numDeallocs: number,
  rng: RandomSource,
): FragmentationResult {
  requireInteger("totalMemory", totalMemory, 1);
  requireInteger("blockSize", blockSize, 1);
  requireInteger("numAllocs", numAllocs, 0);
  requireInteger("numDeallocs", numDeallocs, 0);

  const memory = new FirstFitMemory(totalMemory);
  const allocations = new Map<AllocationId, Allocation>();
  let exhausted = false;

  for (let n = 0; n < numAllocs; n += 1) {
    const allocation = memory.allocate(blockSize);
    if (!allocation) {
      exhausted = true;
      break;
    }
    allocations.set(allocation.id, allocation);
  }

  const deallocatedIds = new Set<AllocationId>();
  for (const allocation of sampleWithoutReplacement([...allocations.values()], numDeallocs, rng)) {
    memory.free(allocation);
    deallocatedIds.add(allocation.id);
  }

  return {
    memory: [...memory.units],
    allocations,
    deallocatedIds,
    requested: numAllocs,
    exhausted,
  };
}
