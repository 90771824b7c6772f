export type ReplacementPolicy = "LRU" | "OPT";

export const REPLACEMENT_POLICIES: readonly ReplacementPolicy[] = ["LRU", "OPT"];

export type PageRef = number;

/** `null` marks an empty frame. */
export type FrameSlot = PageRef | null;

export type StepRecord = {
  t: number;
  ref: PageRef;
  fault: boolean;
  frames: FrameSlot[];
  slot: number;
  evicted?: PageRef;
};

export type PageReplacementResult = {
  policy: ReplacementPolicy;
  numFrames: number;
  steps: StepRecord[];
  faults: number;
  hits: number;
  hitRatio: number;
};

export type FaultCurvePoint = {
  frames: number;
  faults: number;
};
