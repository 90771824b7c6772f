"use client";

import { create } from "zustand";

export type StepMode = "full" | "step";

export type PlaybackRate = 0.5 | 1 | 2 | 4;

export const PLAYBACK_RATES: readonly PlaybackRate[] = [0.5, 1, 2, 4];

type StepStore = {
  mode: StepMode;
  cursor: number;
  lastStep: number;
  isPlaying: boolean;
  playbackRate: PlaybackRate;
  reset: (length: number) => void;
  setMode: (mode: StepMode) => void;
  setCursor: (cursor: number) => void;
  setPlaying: (playing: boolean) => void;
  setPlaybackRate: (rate: PlaybackRate) => void;
  step: (delta: number) => void;
  jumpTo: (cursor: number) => void;
};

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(value, max));
}

export const useStepStore = create<StepStore>((set) => ({
  mode: "full",
  cursor: 0,
  lastStep: 0,
  isPlaying: false,
  playbackRate: 1,
  reset: (length) =>
    set({
      cursor: 0,
      lastStep: Math.max(0, Math.floor(length) - 1),
      isPlaying: false,
    }),
  setMode: (mode) =>
    set((state) => ({
      mode,
      isPlaying: mode === "step" ? state.isPlaying : false,
    })),
  setCursor: (cursor) =>
    set((state) => ({
      cursor: clamp(Math.floor(cursor), 0, state.lastStep),
    })),
  setPlaying: (playing) =>
    set((state) => ({
      isPlaying: playing && state.cursor < state.lastStep,
    })),
  setPlaybackRate: (rate) => set({ playbackRate: rate }),
  step: (delta) =>
    set((state) => {
      const cursor = clamp(state.cursor + Math.floor(delta), 0, state.lastStep);
      return {
        cursor,
        isPlaying: state.isPlaying && cursor < state.lastStep,
      };
    }),
  jumpTo: (cursor) =>
    set((state) => ({
      cursor: clamp(Math.floor(cursor), 0, state.lastStep),
      isPlaying: false,
    })),
}));
