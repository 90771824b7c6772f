import type { StepRecord } from "@/lib/memory/types";

export type StepHeadline = {
  title: string;
  detail: string;
  severity: "info" | "warn" | "success";
};

export function describeStep(step: StepRecord): StepHeadline {
  const frame = step.slot + 1;
  if (!step.fault) {
    return {
      title: "PAGE HIT",
      detail: `t=${step.t}: page ${step.ref} already resident in frame ${frame}`,
      severity: "success",
    };
  }
  if (step.evicted !== undefined) {
    return {
      title: "PAGE FAULT + EVICTION",
      detail: `t=${step.t}: page ${step.ref} replaced page ${step.evicted} in frame ${frame}`,
      severity: "warn",
    };
  }
  return {
    title: "PAGE FAULT",
    detail: `t=${step.t}: page ${step.ref} loaded into free frame ${frame}`,
    severity: "info",
  };
}
