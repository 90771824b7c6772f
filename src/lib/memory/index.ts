import { InvalidConfigurationError, requireInteger } from "@/lib/errors";
import { runLRU } from "@/lib/memory/lru";
import { runOPT } from "@/lib/memory/opt";
import type { PageRef, PageReplacementResult, ReplacementPolicy } from "@/lib/memory/types";
import { REPLACEMENT_POLICIES } from "@/lib/memory/types";

export * from "@/lib/memory/types";
export { RecencyTrack } from "@/lib/memory/recency";
export { nextUseDistance } from "@/lib/memory/opt";

export function isReplacementPolicy(value: string): value is ReplacementPolicy {
  return REPLACEMENT_POLICIES.some((policy) => policy === value);
}

export function runPageReplacement(
  references: readonly PageRef[],
  numFrames: number,
  policy: ReplacementPolicy,
): PageReplacementResult {
  requireInteger("numFrames", numFrames, 1);
  if (!isReplacementPolicy(policy)) {
    throw new InvalidConfigurationError("policy", `Unknown replacement policy: ${String(policy)}`);
  }
  if (policy === "OPT") return runOPT(numFrames, references);
  return runLRU(numFrames, references);
}

export function comparePolicies(
  references: readonly PageRef[],
  numFrames: number,
): Record<ReplacementPolicy, PageReplacementResult> {
  return {
    LRU: runPageReplacement(references, numFrames, "LRU"),
    OPT: runPageReplacement(references, numFrames, "OPT"),
  };
}

export type ParsedReferences = { ok: true; refs: PageRef[] } | { ok: false; error: string };

const INTEGER_RE = /^[+-]?\d+$/;

export function parseReferenceSequence(input: string): ParsedReferences {
  const refs: PageRef[] = [];
  for (const raw of input.split(",")) {
    const token = raw.trim();
    if (!INTEGER_RE.test(token)) {
      return {
        ok: false,
        error: "Invalid input for page reference sequence. Please enter integers separated by commas.",
      };
    }
    refs.push(Number.parseInt(token, 10));
  }
  return { ok: true, refs };
}
