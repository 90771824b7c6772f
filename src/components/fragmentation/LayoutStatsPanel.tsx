import { canFit } from "@/lib/fragmentation/layout";
import type { LayoutStats } from "@/lib/fragmentation/types";

type LayoutStatsPanelProps = {
  stats: LayoutStats;
  blockSize: number;
};

export function LayoutStatsPanel({ stats, blockSize }: LayoutStatsPanelProps) {
  const cells: Array<{ label: string; value: string }> = [
    { label: "Used Units", value: String(stats.usedUnits) },
    { label: "Free Units", value: String(stats.freeUnits) },
    { label: "Utilization", value: `${stats.utilPct.toFixed(1)}%` },
    { label: "Holes", value: String(stats.holes.length) },
    { label: "Largest Free Run", value: String(stats.largestFreeRun) },
    { label: "External Fragmentation", value: `${(stats.externalFragmentation * 100).toFixed(1)}%` },
  ];
  const fits = canFit(stats, blockSize);

  return (
    <div className="neo-panel rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4">
      <p className="text-base font-semibold text-zinc-100">Layout</p>
      <div className="mt-3 grid grid-cols-2 gap-2 lg:grid-cols-3">
        {cells.map((cell) => (
          <div key={cell.label} className="rounded-lg border border-zinc-800/80 bg-zinc-950/40 p-3">
            <p className="text-[11px] uppercase tracking-wide text-zinc-500">{cell.label}</p>
            <p className="mt-1 text-lg font-semibold text-zinc-100">{cell.value}</p>
          </div>
        ))}
      </div>
      <p className={fits ? "mt-3 text-sm text-emerald-300" : "mt-3 text-sm text-rose-300"}>
        {fits
          ? `Another ${blockSize}-unit block would fit.`
          : `No hole can take another ${blockSize}-unit block.`}
      </p>
    </div>
  );
}
