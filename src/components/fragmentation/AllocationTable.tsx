import { ScrollArea } from "@/components/ui/scroll-area";
import { getAllocationColor } from "@/lib/colors";
import type { Allocation, AllocationId } from "@/lib/fragmentation/types";
import { cn } from "@/lib/utils";

type AllocationTableProps = {
  allocations: Map<AllocationId, Allocation>;
  deallocatedIds: Set<AllocationId>;
};

export function AllocationTable({ allocations, deallocatedIds }: AllocationTableProps) {
  return (
    <ScrollArea label="Allocations" className="max-h-[320px] rounded-xl border border-zinc-800/70">
      <table className="w-full text-sm">
        <thead className="sticky top-0 bg-zinc-950 text-xs uppercase tracking-wide text-zinc-500">
          <tr>
            <th className="px-3 py-2 text-left">Block</th>
            <th className="px-3 py-2 text-right">Start</th>
            <th className="px-3 py-2 text-right">End</th>
            <th className="px-3 py-2 text-right">Status</th>
          </tr>
        </thead>
        <tbody>
          {[...allocations.values()].map((allocation) => {
            const freed = deallocatedIds.has(allocation.id);
            return (
              <tr key={allocation.id} className={cn("border-t border-zinc-800/60", freed ? "text-zinc-500" : "text-zinc-200")}>
                <td className="px-3 py-1.5">
                  <span className="inline-flex items-center gap-2">
                    <span
                      className="size-3 rounded-sm border border-black/60"
                      style={{ background: freed ? "transparent" : getAllocationColor(allocation.id) }}
                    />
                    #{allocation.id}
                  </span>
                </td>
                <td className="px-3 py-1.5 text-right">{allocation.start}</td>
                <td className="px-3 py-1.5 text-right">{allocation.end}</td>
                <td className="px-3 py-1.5 text-right">{freed ? "Freed" : "Live"}</td>
              </tr>
            );
          })}
        </tbody>
      </table>
    </ScrollArea>
  );
}
