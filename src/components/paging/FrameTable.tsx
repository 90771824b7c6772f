import { ScrollArea } from "@/components/ui/scroll-area";
import type { StepRecord } from "@/lib/memory/types";
import { cn } from "@/lib/utils";

type FrameTableProps = {
  steps: StepRecord[];
  numFrames: number;
  activeStep?: number;
};

export function FrameTable({ steps, numFrames, activeStep }: FrameTableProps) {
  const frameHeaders = Array.from({ length: numFrames }, (_, idx) => `Frame ${idx + 1}`);

  return (
    <ScrollArea label="Frame history" className="max-h-[360px] rounded-xl border border-zinc-800/70">
      <table className="w-full text-center text-sm">
        <thead className="sticky top-0 bg-zinc-950 text-xs uppercase tracking-wide text-zinc-500">
          <tr>
            <th className="px-3 py-2">Step</th>
            <th className="px-3 py-2">Reference</th>
            <th className="px-3 py-2">Fault</th>
            {frameHeaders.map((header) => (
              <th key={header} className="px-3 py-2">
                {header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {steps.map((step) => (
            <tr
              key={step.t}
              className={cn(
                "border-t border-zinc-800/60 text-zinc-200",
                step.fault && "bg-rose-500/10",
                activeStep === step.t && "outline outline-1 outline-sky-400",
              )}
            >
              <td className="px-3 py-1.5 text-zinc-500">{step.t}</td>
              <td className="px-3 py-1.5 font-semibold">{step.ref}</td>
              <td className="px-3 py-1.5 text-rose-300">{step.fault ? "Yes" : ""}</td>
              {step.frames.map((page, idx) => (
                <td key={idx} className={cn("px-3 py-1.5", step.fault && idx === step.slot && "font-semibold text-rose-200")}>
                  {page ?? ""}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </ScrollArea>
  );
}
