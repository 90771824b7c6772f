import { getAllocationColor } from "@/lib/colors";
import type { MemoryUnit } from "@/lib/fragmentation/types";

type MemoryStripProps = {
  memory: MemoryUnit[];
};

export function MemoryStrip({ memory }: MemoryStripProps) {
  const tickEvery = Math.max(1, Math.floor(memory.length / 10));
  const ticks = Array.from({ length: Math.floor(memory.length / tickEvery) + 1 }, (_, idx) => idx * tickEvery);

  return (
    <div className="space-y-1">
      <div className="flex h-14 w-full overflow-hidden rounded-md border border-zinc-700">
        {memory.map((unit, idx) => (
          <div
            key={idx}
            title={unit === null ? `unit ${idx}: free` : `unit ${idx}: allocation ${unit}`}
            className={unit === null ? "border-r border-zinc-400/60" : "border-r border-black/70"}
            style={{ flex: "1 1 0", background: getAllocationColor(unit) }}
          />
        ))}
      </div>
      <div className="relative h-4 text-[10px] text-zinc-500">
        {ticks.map((tick) => (
          <span
            key={tick}
            className="absolute -translate-x-1/2"
            style={{ left: `${(tick / Math.max(1, memory.length)) * 100}%` }}
          >
            {tick}
          </span>
        ))}
      </div>
    </div>
  );
}
