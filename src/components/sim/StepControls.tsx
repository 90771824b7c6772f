"use client";

import { Pause, Play, SkipBack, SkipForward } from "lucide-react";

import { cn } from "@/lib/utils";
import { PLAYBACK_RATES } from "@/store/stepStore";
import type { PlaybackRate, StepMode } from "@/store/stepStore";

type StepControlsProps = {
  mode: StepMode;
  onModeChange: (mode: StepMode) => void;
  cursor: number;
  lastStep: number;
  isPlaying: boolean;
  playbackRate: PlaybackRate;
  onScrub: (cursor: number) => void;
  onPlayPause: () => void;
  onStepBack: () => void;
  onStepForward: () => void;
  onStart: () => void;
  onEnd: () => void;
  onRateChange: (rate: PlaybackRate) => void;
};

const buttonClass =
  "inline-flex h-8 items-center gap-1 rounded-md border border-zinc-700 px-3 text-xs font-medium text-zinc-200 hover:bg-zinc-800";

function ModeButton({ active, label, onClick }: { active: boolean; label: string; onClick: () => void }) {
  return (
    <button
      type="button"
      className={cn(
        "rounded-full px-3 py-1 text-sm",
        active ? "bg-white text-black hover:bg-zinc-200" : "text-zinc-300 hover:text-zinc-100",
      )}
      onClick={onClick}
    >
      {label}
    </button>
  );
}

export function StepControls({
  mode,
  onModeChange,
  cursor,
  lastStep,
  isPlaying,
  playbackRate,
  onScrub,
  onPlayPause,
  onStepBack,
  onStepForward,
  onStart,
  onEnd,
  onRateChange,
}: StepControlsProps) {
  return (
    <div className="neo-panel space-y-3 rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4 backdrop-blur-md">
      <div className="flex flex-wrap items-center justify-between gap-3">
        <div className="flex items-center gap-2 rounded-full border border-white/10 bg-zinc-950/55 p-1">
          <ModeButton active={mode === "full"} label="Full Trace" onClick={() => onModeChange("full")} />
          <ModeButton active={mode === "step"} label="Step Through" onClick={() => onModeChange("step")} />
        </div>

        {mode === "step" ? (
          <p className="text-xs font-medium text-zinc-300">
            t = {cursor} / {lastStep}
          </p>
        ) : null}
      </div>

      {mode === "step" ? (
        <>
          <div className="rounded-xl border border-zinc-800/70 bg-zinc-900/40 px-3 py-2">
            <input
              type="range"
              className="w-full accent-sky-400"
              value={cursor}
              min={0}
              max={Math.max(1, lastStep)}
              step={1}
              onChange={(event) => onScrub(Number(event.target.value))}
            />
          </div>

          <div className="flex flex-wrap items-center justify-between gap-3">
            <div className="flex items-center gap-2">
              <button type="button" className={buttonClass} onClick={onStart}>
                <SkipBack className="size-4" />
                Start
              </button>
              <button type="button" className={buttonClass} onClick={onStepBack}>
                ◀ Step
              </button>
              <button
                type="button"
                className="inline-flex h-8 items-center gap-1.5 rounded-md bg-white px-3 text-xs font-medium text-black hover:bg-zinc-200"
                onClick={onPlayPause}
              >
                {isPlaying ? <Pause className="size-4" /> : <Play className="size-4" />}
                {isPlaying ? "Pause" : "Play"}
              </button>
              <button type="button" className={buttonClass} onClick={onStepForward}>
                Step ▶
              </button>
              <button type="button" className={buttonClass} onClick={onEnd}>
                End
                <SkipForward className="size-4" />
              </button>
            </div>

            <label className="flex items-center gap-2 text-xs text-zinc-400">
              Speed
              <select
                className="h-8 rounded-md border border-zinc-700 bg-zinc-900 px-2 text-zinc-200"
                value={String(playbackRate)}
                onChange={(event) => {
                  const rate = PLAYBACK_RATES.find((value) => String(value) === event.target.value);
                  if (rate !== undefined) onRateChange(rate);
                }}
              >
                {PLAYBACK_RATES.map((rate) => (
                  <option key={rate} value={String(rate)}>
                    {rate}x
                  </option>
                ))}
              </select>
            </label>
          </div>
        </>
      ) : null}
    </div>
  );
}
