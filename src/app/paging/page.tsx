"use client";

import { useCallback, useMemo, useState } from "react";
import { toast } from "sonner";

import { FaultCurveChart } from "@/components/paging/FaultCurveChart";
import { FrameHeatmap } from "@/components/paging/FrameHeatmap";
import { FrameTable } from "@/components/paging/FrameTable";
import { TraceRangeCard } from "@/components/paging/TraceRangeCard";
import { StepControls } from "@/components/sim/StepControls";
import { clampRange } from "@/lib/analytics/rangeIndex";
import type { IndexRange } from "@/lib/analytics/rangeIndex";
import { buildTraceAnalytics } from "@/lib/analytics/traceAnalytics";
import { clampToLimit, PAGING_DEFAULTS, PAGING_LIMITS } from "@/lib/config";
import { getErrorMessage } from "@/lib/errors";
import { isReplacementPolicy, parseReferenceSequence, REPLACEMENT_POLICIES, runPageReplacement } from "@/lib/memory";
import type { FaultCurvePoint, PageReplacementResult, ReplacementPolicy } from "@/lib/memory";
import { hasBeladyAnomaly, sweepFrameCounts } from "@/lib/memory/sweep";
import { describeStep } from "@/lib/sim/stepHeadline";
import { cn } from "@/lib/utils";
import { useStepStore } from "@/store/stepStore";
import { usePlayback } from "@/app/sim/usePlayback";

const STEP_MS = 700;

const POLICY_LABELS: Record<ReplacementPolicy, string> = {
  LRU: "LRU (Least Recently Used)",
  OPT: "Optimal",
};

const severityClass = {
  info: "border-sky-500/40 text-sky-200",
  warn: "border-rose-500/40 text-rose-200",
  success: "border-emerald-500/40 text-emerald-200",
};

export default function PagingPage() {
  const [numFrames, setNumFrames] = useState(PAGING_DEFAULTS.numFrames);
  const [sequence, setSequence] = useState(PAGING_DEFAULTS.sequence);
  const [policy, setPolicy] = useState<ReplacementPolicy>(PAGING_DEFAULTS.policy);
  const [result, setResult] = useState<PageReplacementResult | null>(null);
  const [range, setRange] = useState<IndexRange>({ l: 0, r: 0 });
  const [curves, setCurves] = useState<{ lru: FaultCurvePoint[]; opt: FaultCurvePoint[] } | null>(null);

  const {
    mode,
    cursor,
    lastStep,
    isPlaying,
    playbackRate,
    reset,
    setMode,
    setCursor,
    setPlaying,
    setPlaybackRate,
    step,
    jumpTo,
  } = useStepStore();

  const parsed = useMemo(() => parseReferenceSequence(sequence), [sequence]);

  const runSimulation = useCallback(() => {
    if (!parsed.ok) {
      toast.error(parsed.error);
      return;
    }
    if (parsed.refs.length === 0) {
      toast.warning("Please provide a valid page reference sequence.");
      return;
    }
    try {
      const next = runPageReplacement(parsed.refs, numFrames, policy);
      setResult(next);
      setCurves({
        lru: sweepFrameCounts(parsed.refs, "LRU", PAGING_LIMITS.numFrames.max),
        opt: sweepFrameCounts(parsed.refs, "OPT", PAGING_LIMITS.numFrames.max),
      });
      reset(next.steps.length);
      setRange({ l: 0, r: Math.max(0, next.steps.length - 1) });
      toast.success(`Simulation complete! Total page faults: ${next.faults}`);
    } catch (error) {
      toast.error(getErrorMessage(error, "Unable to run page replacement"));
    }
  }, [numFrames, parsed, policy, reset]);

  const advance = useCallback(() => step(1), [step]);
  usePlayback({ isPlaying, stepMs: STEP_MS, playbackRate, onAdvance: advance });

  const analytics = useMemo(() => (result ? buildTraceAnalytics(result.steps) : null), [result]);
  const rangeStats = useMemo(
    () => (analytics ? analytics.getRangeStats(range.l, range.r) : null),
    [analytics, range],
  );

  const visibleSteps = result ? (mode === "step" ? result.steps.slice(0, cursor + 1) : result.steps) : [];
  const currentStep = result && mode === "step" ? result.steps[cursor] : undefined;
  const headline = currentStep ? describeStep(currentStep) : null;

  return (
    <main className="mx-auto flex w-full max-w-[1400px] flex-col gap-4 px-4 py-6 md:px-8">
      <div className="space-y-1">
        <h1 className="text-2xl font-semibold tracking-tight text-zinc-100">Page Replacement Simulation</h1>
        <p className="text-sm text-zinc-400">Rows highlighted in red indicate a page fault at that step.</p>
      </div>

      <section className="neo-panel grid gap-4 rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4 md:grid-cols-[160px_1fr_220px_auto] md:items-end">
        <label className="space-y-1 text-xs text-zinc-400">
          Number of Frames
          <input
            type="number"
            className="h-9 w-full rounded-md border border-zinc-700 bg-zinc-900 px-2 text-sm text-zinc-100"
            min={PAGING_LIMITS.numFrames.min}
            max={PAGING_LIMITS.numFrames.max}
            step={PAGING_LIMITS.numFrames.step}
            value={numFrames}
            onChange={(event) => setNumFrames(clampToLimit(Number(event.target.value), PAGING_LIMITS.numFrames))}
          />
        </label>
        <label className="space-y-1 text-xs text-zinc-400">
          Page Reference Sequence (comma separated)
          <input
            type="text"
            className={cn(
              "h-9 w-full rounded-md border bg-zinc-900 px-2 font-mono text-sm text-zinc-100",
              parsed.ok ? "border-zinc-700" : "border-rose-500/70",
            )}
            value={sequence}
            onChange={(event) => setSequence(event.target.value)}
          />
        </label>
        <label className="space-y-1 text-xs text-zinc-400">
          Replacement Algorithm
          <select
            className="h-9 w-full rounded-md border border-zinc-700 bg-zinc-900 px-2 text-sm text-zinc-100"
            value={policy}
            onChange={(event) => {
              if (isReplacementPolicy(event.target.value)) setPolicy(event.target.value);
            }}
          >
            {REPLACEMENT_POLICIES.map((value) => (
              <option key={value} value={value}>
                {POLICY_LABELS[value]}
              </option>
            ))}
          </select>
        </label>
        <button
          type="button"
          className="h-9 rounded-md bg-emerald-500 px-4 text-sm font-medium text-black hover:bg-emerald-400"
          onClick={runSimulation}
        >
          Run Page Replacement Simulation
        </button>
      </section>

      {result ? (
        <>
          <div className="grid gap-4 md:grid-cols-4">
            {[
              { label: "Algorithm", value: POLICY_LABELS[result.policy] },
              { label: "Page Faults", value: result.faults },
              { label: "Hits", value: result.hits },
              { label: "Hit Ratio", value: `${(result.hitRatio * 100).toFixed(1)}%` },
            ].map((card) => (
              <div key={card.label} className="neo-panel rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4">
                <p className="text-[11px] uppercase tracking-wide text-zinc-500">{card.label}</p>
                <p className="mt-1 text-lg font-semibold text-zinc-100">{card.value}</p>
              </div>
            ))}
          </div>

          <StepControls
            mode={mode}
            onModeChange={setMode}
            cursor={cursor}
            lastStep={lastStep}
            isPlaying={isPlaying}
            playbackRate={playbackRate}
            onScrub={setCursor}
            onPlayPause={() => setPlaying(!isPlaying)}
            onStepBack={() => step(-1)}
            onStepForward={() => step(1)}
            onStart={() => jumpTo(0)}
            onEnd={() => jumpTo(lastStep)}
            onRateChange={setPlaybackRate}
          />

          {headline ? (
            <div className={cn("rounded-xl border bg-zinc-950/60 px-4 py-3", severityClass[headline.severity])}>
              <p className="text-xs font-semibold tracking-[0.18em]">{headline.title}</p>
              <p className="mt-1 text-sm text-zinc-300">{headline.detail}</p>
            </div>
          ) : null}

          <div className="grid gap-4 lg:grid-cols-[1fr_auto]">
            <section className="space-y-2">
              <h2 className="text-base font-semibold text-zinc-100">Step-by-Step Frame History</h2>
              <FrameTable
                steps={visibleSteps}
                numFrames={result.numFrames}
                activeStep={mode === "step" ? cursor : undefined}
              />
            </section>
            <section className="space-y-2">
              <h2 className="text-base font-semibold text-zinc-100">Frame Status Heatmap</h2>
              <FrameHeatmap steps={visibleSteps} numFrames={result.numFrames} />
            </section>
          </div>

          {rangeStats ? (
            <TraceRangeCard
              range={range}
              lastStep={lastStep}
              stats={rangeStats}
              onRangeChange={(next) => setRange(clampRange(next, lastStep))}
            />
          ) : null}

          {curves ? (
            <section className="neo-panel space-y-2 rounded-2xl border border-zinc-800/70 bg-zinc-950/60 p-4">
              <div className="flex flex-wrap items-center justify-between gap-2">
                <h2 className="text-base font-semibold text-zinc-100">Faults by Frame Count</h2>
                <span className="text-xs text-zinc-400">
                  {hasBeladyAnomaly(curves.lru) || hasBeladyAnomaly(curves.opt)
                    ? "Adding frames increased faults somewhere on this curve."
                    : "Faults never increase as frames are added."}
                </span>
              </div>
              <FaultCurveChart lru={curves.lru} opt={curves.opt} />
            </section>
          ) : null}
        </>
      ) : null}
    </main>
  );
}
