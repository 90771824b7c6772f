export type AllocationId = number;

/** `null` marks a free unit. */
export type MemoryUnit = AllocationId | null;

/** Uniform value in [0, 1), as produced by a seedrandom PRNG. */
export type RandomSource = () => number;

export type Allocation = {
  id: AllocationId;
  start: number;
  end: number;
};

export type FragmentationResult = {
  memory: MemoryUnit[];
  allocations: Map<AllocationId, Allocation>;
  deallocatedIds: Set<AllocationId>;
  requested: number;
  exhausted: boolean;
};

export type Hole = {
  start: number;
  end: number;
  length: number;
};

export type LayoutStats = {
  totalUnits: number;
  usedUnits: number;
  freeUnits: number;
  utilPct: number;
  holes: Hole[];
  largestFreeRun: number;
  externalFragmentation: number;
};
