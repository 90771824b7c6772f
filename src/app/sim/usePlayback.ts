"use client";

import { useEffect, useRef } from "react";

type PlaybackInput = {
  isPlaying: boolean;
  stepMs: number;
  playbackRate: number;
  onAdvance: () => void;
};

/** Calls `onAdvance` once per `stepMs / playbackRate` while playing. */
export function usePlayback({ isPlaying, stepMs, playbackRate, onAdvance }: PlaybackInput) {
  const onAdvanceRef = useRef(onAdvance);
  const rafRef = useRef<number | null>(null);

  useEffect(() => {
    onAdvanceRef.current = onAdvance;
  }, [onAdvance]);

  useEffect(() => {
    if (!isPlaying) return;

    const intervalMs = Math.max(1, stepMs / Math.max(0.01, playbackRate));
    let lastTs = performance.now();

    const frame = (now: number) => {
      if (now - lastTs >= intervalMs) {
        lastTs = now;
        onAdvanceRef.current();
      }
      rafRef.current = requestAnimationFrame(frame);
    };

    rafRef.current = requestAnimationFrame(frame);

    return () => {
      if (rafRef.current !== null) {
        cancelAnimationFrame(rafRef.current);
      }
      rafRef.current = null;
    };
  }, [isPlaying, stepMs, playbackRate]);
}
