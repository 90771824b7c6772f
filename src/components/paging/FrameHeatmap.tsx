import { getPageColor } from "@/lib/colors";
import type { StepRecord } from "@/lib/memory/types";

type FrameHeatmapProps = {
  steps: StepRecord[];
  numFrames: number;
};

const CELL = 28;

export function FrameHeatmap({ steps, numFrames }: FrameHeatmapProps) {
  return (
    <div className="overflow-x-auto">
      <div
        className="grid gap-px rounded-lg bg-zinc-700 p-px"
        style={{ gridTemplateColumns: `repeat(${numFrames}, ${CELL}px)`, width: "max-content" }}
        role="grid"
        aria-label="Frame status over time"
      >
        {steps.flatMap((step) =>
          step.frames.map((page, idx) => (
            <div
              key={`${step.t}-${idx}`}
              role="gridcell"
              title={`t=${step.t}, frame ${idx + 1}: ${page ?? "empty"}`}
              className="flex items-center justify-center text-xs font-semibold text-zinc-950"
              style={{ height: CELL, background: getPageColor(page) }}
            >
              {page ?? ""}
            </div>
          )),
        )}
      </div>
      <div className="mt-2 flex justify-between text-[11px] text-zinc-500" style={{ width: numFrames * (CELL + 1) }}>
        <span>Frames →</span>
        <span>Steps ↓</span>
      </div>
    </div>
  );
}
