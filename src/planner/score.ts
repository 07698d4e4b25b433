import type { ScoreBreakdown, ScoreWeights } from "../../contracts/types.js";
import type { CandidateProvider } from "../catalog/types.js";

export const DEFAULT_WEIGHTS: ScoreWeights = {
  reusability: 1.0,
  timeSaved: 1.5,
  leverage: 2.0,
  contextCost: 0.5,
  gapWeight: 1.5,
};

/** Relevant files beyond this count add no more leverage */
const LEVERAGE_FILE_CAP = 12;
const LEVERAGE_PER_FILE = 0.25;

const clamp10 = (n: number): number => Math.min(10, Math.max(0, n));

/** 5 with no matching gap, then 7 / 8 / 10 for one / two / three or more */
export function gapWeight(boostedBy: readonly string[], gaps: readonly string[]): number {
  if (boostedBy.length === 0) return 5;
  const needles = boostedBy.map((b) => b.toLowerCase());
  const matched = gaps.filter((g) => {
    const hay = g.toLowerCase();
    return needles.some((n) => hay.includes(n));
  }).length;
  if (matched >= 3) return 10;
  if (matched === 2) return 8;
  if (matched === 1) return 7;
  return 5;
}

export function leverage(base: number, relevantFiles: number): number {
  return clamp10(base + LEVERAGE_PER_FILE * Math.min(relevantFiles, LEVERAGE_FILE_CAP));
}

/** Packaged-context size mapped onto a 0..-10 penalty */
export function contextCost(contextTokens: number, maxContextTokens: number): number {
  if (maxContextTokens <= 0 || contextTokens <= 0) return 0;
  return -Math.min(10, (10 * contextTokens) / maxContextTokens);
}

export function totalScore(f: Omit<ScoreBreakdown, "totalScore">, w: ScoreWeights): number {
  return (
    w.reusability * f.reusability +
    w.timeSaved * f.timeSaved +
    w.leverage * f.leverage +
    w.contextCost * f.contextCost +
    w.gapWeight * f.gapWeight
  );
}

export interface ScoreInput {
  provider: CandidateProvider;
  relevantFiles: number;
  contextTokens: number;
  maxContextTokens: number;
  gaps: readonly string[];
  weights: ScoreWeights;
}

export function scoreCandidate(input: ScoreInput): ScoreBreakdown {
  const { provider } = input;
  const factors = {
    reusability: clamp10(provider.base.reusability),
    timeSaved: clamp10(provider.base.timeSaved),
    leverage: leverage(provider.base.leverage, input.relevantFiles),
    contextCost: contextCost(input.contextTokens, input.maxContextTokens),
    gapWeight: gapWeight(provider.boostedByGaps, input.gaps),
  };
  return { ...factors, totalScore: totalScore(factors, input.weights) };
}
