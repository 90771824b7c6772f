"use client";

import type { IndexRange } from "@/lib/analytics/rangeIndex";
import type { TraceRangeStats } from "@/lib/analytics/traceAnalytics";

type TraceRangeCardProps = {
  range: IndexRange;
  lastStep: number;
  stats: TraceRangeStats;
  onRangeChange: (range: IndexRange) => void;
};

export function TraceRangeCard({ range, lastStep, stats, onRangeChange }: TraceRangeCardProps) {
  const safeLast = Math.max(0, lastStep);
  const cells = [
    { label: "Faults", value: stats.faults },
    { label: "Hits", value: stats.hits },
    { label: "Fault Rate", value: `${stats.faultRatePct.toFixed(1)}%` },
    { label: "Longest Fault Streak", value: stats.longestFaultStreak },
    { label: "Longest Hit Streak", value: stats.longestHitStreak },
    { label: "Range Length", value: stats.steps },
  ];

  return (
    <div className="neo-panel rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4">
      <div className="flex flex-wrap items-center justify-between gap-2">
        <p className="text-sm font-semibold text-zinc-200">Step Range</p>
        <span className="rounded-md border border-zinc-700 px-2 py-0.5 text-xs text-zinc-300">
          t={range.l}..{range.r}
        </span>
      </div>

      <div className="mt-3 grid grid-cols-2 gap-3">
        <label className="text-[11px] text-zinc-500">
          From
          <input
            type="range"
            className="w-full accent-sky-400"
            min={0}
            max={safeLast}
            value={range.l}
            disabled={safeLast <= 0}
            onChange={(event) => onRangeChange({ l: Number(event.target.value), r: range.r })}
          />
        </label>
        <label className="text-[11px] text-zinc-500">
          To
          <input
            type="range"
            className="w-full accent-sky-400"
            min={0}
            max={safeLast}
            value={range.r}
            disabled={safeLast <= 0}
            onChange={(event) => onRangeChange({ l: range.l, r: Number(event.target.value) })}
          />
        </label>
      </div>

      <div className="mt-4 grid gap-2 sm:grid-cols-2 lg:grid-cols-3">
        {cells.map((cell) => (
          <div key={cell.label} className="rounded-lg border border-zinc-800/70 bg-zinc-900/45 px-3 py-2">
            <p className="text-[11px] uppercase tracking-wide text-zinc-500">{cell.label}</p>
            <p className="mt-1 text-sm font-semibold text-zinc-100">{cell.value}</p>
          </div>
        ))}
      </div>
    </div>
  );
}
