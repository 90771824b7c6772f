"use client";

import { CartesianGrid, Legend, Line, LineChart, ResponsiveContainer, Tooltip, XAxis, YAxis } from "recharts";

import type { FaultCurvePoint } from "@/lib/memory/types";

type FaultCurveChartProps = {
  lru: FaultCurvePoint[];
  opt: FaultCurvePoint[];
};

export function FaultCurveChart({ lru, opt }: FaultCurveChartProps) {
  const data = lru.map((point, idx) => ({
    frames: point.frames,
    LRU: point.faults,
    OPT: opt[idx]?.faults ?? null,
  }));

  return (
    <div className="h-64 w-full">
      <ResponsiveContainer width="100%" height="100%">
        <LineChart data={data}>
          <CartesianGrid strokeDasharray="3 3" stroke="#3f3f46" />
          <XAxis dataKey="frames" stroke="#a1a1aa" />
          <YAxis stroke="#a1a1aa" allowDecimals={false} />
          <Tooltip contentStyle={{ background: "#0f172a", border: "1px solid #334155", borderRadius: 10 }} />
          <Legend />
          <Line type="monotone" dataKey="LRU" stroke="#38bdf8" strokeWidth={2} dot />
          <Line type="monotone" dataKey="OPT" stroke="#a78bfa" strokeWidth={2} dot />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
