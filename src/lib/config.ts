import type { ReplacementPolicy } from "@/lib/memory/types";

export type NumericLimit = {
  min: number;
  max: number;
  step: number;
};

export const PAGING_DEFAULTS: { numFrames: number; sequence: string; policy: ReplacementPolicy } = {
  numFrames: 3,
  sequence: "1,2,3,2,4,1,5,2,1,2,3,4,5",
  policy: "LRU",
};

export const PAGING_LIMITS = {
  numFrames: { min: 1, max: 10, step: 1 },
} satisfies Record<string, NumericLimit>;

export const FRAGMENTATION_DEFAULTS = {
  totalMemory: 200,
  blockSize: 20,
  numAllocs: 8,
  numDeallocs: 3,
  seed: "memory-lab",
};

export const FRAGMENTATION_LIMITS = {
  totalMemory: { min: 50, max: 500, step: 10 },
  blockSize: { min: 5, max: 50, step: 5 },
  numAllocs: { min: 1, max: 20, step: 1 },
  numDeallocs: { min: 0, max: 10, step: 1 },
} satisfies Record<string, NumericLimit>;

/** Snaps raw form input into [min, max] and onto the step grid from `min`. */
export function clampToLimit(value: number, limit: NumericLimit): number {
  if (!Number.isFinite(value)) return limit.min;
  const stepped = limit.min + Math.round((value - limit.min) / limit.step) * limit.step;
  return Math.max(limit.min, Math.min(stepped, limit.max));
}
