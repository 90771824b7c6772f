import { beforeEach, describe, expect, it } from "vitest";

import { useStepStore } from "@/store/stepStore";

describe("useStepStore", () => {
  beforeEach(() => {
    useStepStore.getState().setMode("full");
    useStepStore.getState().setPlaybackRate(1);
    useStepStore.getState().reset(13);
  });

  it("resets the cursor to the first step", () => {
    const state = useStepStore.getState();

    expect(state.cursor).toBe(0);
    expect(state.lastStep).toBe(12);
    expect(state.isPlaying).toBe(false);
  });

  it("clamps stepping to the trace bounds", () => {
    useStepStore.getState().step(5);
    expect(useStepStore.getState().cursor).toBe(5);

    useStepStore.getState().step(100);
    expect(useStepStore.getState().cursor).toBe(12);

    useStepStore.getState().setCursor(-4);
    expect(useStepStore.getState().cursor).toBe(0);
  });

  it("stops playing on the last step", () => {
    useStepStore.getState().setMode("step");
    useStepStore.getState().setPlaying(true);
    expect(useStepStore.getState().isPlaying).toBe(true);

    useStepStore.getState().step(20);
    expect(useStepStore.getState().cursor).toBe(12);
    expect(useStepStore.getState().isPlaying).toBe(false);

    useStepStore.getState().setPlaying(true);
    expect(useStepStore.getState().isPlaying).toBe(false);
  });

  it("pauses when jumping or leaving step mode", () => {
    useStepStore.getState().setMode("step");
    useStepStore.getState().setPlaying(true);
    useStepStore.getState().jumpTo(4);
    expect(useStepStore.getState()).toMatchObject({ cursor: 4, isPlaying: false });

    useStepStore.getState().setPlaying(true);
    useStepStore.getState().setMode("full");
    expect(useStepStore.getState().isPlaying).toBe(false);
  });

  it("keeps a single-step trace at cursor zero", () => {
    useStepStore.getState().reset(0);
    useStepStore.getState().step(3);

    expect(useStepStore.getState()).toMatchObject({ cursor: 0, lastStep: 0 });
  });
});
