import type { RandomSource } from "@/lib/fragmentation/types";

/**
 * Picks `k` items uniformly without replacement (partial Fisher-Yates).
 * Draws exactly `min(k, items.length)` values from `rng`.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], k: number, rng: RandomSource): T[] {
  const pool = [...items];
  const picks = Math.max(0, Math.min(Math.floor(k), pool.length));

  for (let i = 0; i < picks; i += 1) {
    const j = i + Math.floor(rng() * (pool.length - i));
    const chosen = pool[j];
    pool[j] = pool[i];
    pool[i] = chosen;
  }

  return pool.slice(0, picks);
}
