"use client";

import { useCallback, useMemo, useState } from "react";
import { toast } from "sonner";

import { AllocationTable } from "@/components/fragmentation/AllocationTable";
import { LayoutStatsPanel } from "@/components/fragmentation/LayoutStatsPanel";
import { MemoryStrip } from "@/components/fragmentation/MemoryStrip";
import { clampToLimit, FRAGMENTATION_DEFAULTS, FRAGMENTATION_LIMITS } from "@/lib/config";
import type { NumericLimit } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { analyzeLayout, createRandomSource, runFragmentation } from "@/lib/fragmentation";
import type { FragmentationResult } from "@/lib/fragmentation";

type FragmentationParams = {
  totalMemory: number;
  blockSize: number;
  numAllocs: number;
  numDeallocs: number;
};

type ParamKey = keyof FragmentationParams;

const SLIDERS: Array<{ key: ParamKey; label: string; limit: NumericLimit }> = [
  { key: "totalMemory", label: "Total Memory Size (units)", limit: FRAGMENTATION_LIMITS.totalMemory },
  { key: "blockSize", label: "Block Size (units)", limit: FRAGMENTATION_LIMITS.blockSize },
  { key: "numAllocs", label: "Number of Allocations", limit: FRAGMENTATION_LIMITS.numAllocs },
  { key: "numDeallocs", label: "Number of Deallocations", limit: FRAGMENTATION_LIMITS.numDeallocs },
];

export default function FragmentationPage() {
  const [params, setParams] = useState<FragmentationParams>({
    totalMemory: FRAGMENTATION_DEFAULTS.totalMemory,
    blockSize: FRAGMENTATION_DEFAULTS.blockSize,
    numAllocs: FRAGMENTATION_DEFAULTS.numAllocs,
    numDeallocs: FRAGMENTATION_DEFAULTS.numDeallocs,
  });
  const [seed, setSeed] = useState(FRAGMENTATION_DEFAULTS.seed);
  const [result, setResult] = useState<{ run: FragmentationResult; blockSize: number } | null>(null);

  const simulate = useCallback(() => {
    try {
      const run = runFragmentation(
        params.totalMemory,
        params.blockSize,
        params.numAllocs,
        params.numDeallocs,
        createRandomSource(seed),
      );
      setResult({ run, blockSize: params.blockSize });
      if (run.exhausted) {
        toast.warning(`No contiguous free space after ${run.allocations.size} of ${run.requested} allocations.`);
      } else {
        toast.success("Memory fragmentation simulation complete!");
      }
    } catch (error) {
      toast.error(getErrorMessage(error, "Unable to simulate fragmentation"));
    }
  }, [params, seed]);

  const stats = useMemo(() => (result ? analyzeLayout(result.run.memory) : null), [result]);

  return (
    <main className="mx-auto flex w-full max-w-[1400px] flex-col gap-4 px-4 py-6 md:px-8">
      <div className="space-y-1">
        <h1 className="text-2xl font-semibold tracking-tight text-zinc-100">Memory Fragmentation Simulation</h1>
        <p className="text-sm text-zinc-400">
          Blocks are placed first-fit from address 0, then a random subset is freed.
        </p>
      </div>

      <section className="neo-panel grid gap-4 rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4 md:grid-cols-2 xl:grid-cols-3">
        {SLIDERS.map(({ key, label, limit }) => (
          <label key={key} className="space-y-1 text-xs text-zinc-400">
            <span className="flex justify-between">
              {label}
              <span className="font-semibold text-zinc-100">{params[key]}</span>
            </span>
            <input
              type="range"
              className="w-full accent-emerald-400"
              min={limit.min}
              max={limit.max}
              step={limit.step}
              value={params[key]}
              onChange={(event) =>
                setParams((prev) => ({ ...prev, [key]: clampToLimit(Number(event.target.value), limit) }))
              }
            />
          </label>
        ))}
        <label className="space-y-1 text-xs text-zinc-400">
          Seed
          <input
            type="text"
            className="h-9 w-full rounded-md border border-zinc-700 bg-zinc-900 px-2 font-mono text-sm text-zinc-100"
            value={seed}
            onChange={(event) => setSeed(event.target.value)}
          />
        </label>
        <div className="flex items-end">
          <button
            type="button"
            className="h-9 rounded-md bg-emerald-500 px-4 text-sm font-medium text-black hover:bg-emerald-400"
            onClick={simulate}
          >
            Simulate Fragmentation
          </button>
        </div>
      </section>

      {result && stats ? (
        <>
          <section className="neo-panel space-y-3 rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4">
            <h2 className="text-base font-semibold text-zinc-100">Memory Layout</h2>
            <MemoryStrip memory={result.run.memory} />
            <p className="text-xs text-zinc-400">
              <strong>Legend:</strong> Each colored block represents an allocation. White blocks indicate free memory.
            </p>
          </section>

          <div className="grid gap-4 lg:grid-cols-2">
            <LayoutStatsPanel stats={stats} blockSize={result.blockSize} />
            <section className="space-y-2">
              <h2 className="text-base font-semibold text-zinc-100">
                Allocations ({result.run.allocations.size} made, {result.run.deallocatedIds.size} freed)
              </h2>
              <AllocationTable allocations={result.run.allocations} deallocatedIds={result.run.deallocatedIds} />
            </section>
          </div>
        </>
      ) : null}
    </main>
  );
}
