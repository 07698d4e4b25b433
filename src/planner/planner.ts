import {
  ARTIFACT_FAMILIES,
  SCHEMA_VERSION,
  type ArtifactFamily,
  type Budgets,
  type ContextRef,
  type ExcludedCandidate,
  type Plan,
  type PlanJob,
  type RepoIndex,
  type RepoSignals,
  type ScoreBreakdown,
  type ScoreWeights,
} from "../../contracts/types.js";
import type { CandidateProvider } from "../catalog/types.js";
import { PlanInputError } from "../errors.js";
import { RepoIndexSchema, RepoSignalsSchema, ScoreWeightsSchema, describeIssues } from "../schemas.js";
import { canonicalJson, compareStrings, sha256Hex } from "../util/canonical.js";
import { DEFAULT_WEIGHTS, scoreCandidate } from "./score.js";

export interface PlannerConfig {
  weights: ScoreWeights;
  /** Candidates scoring below this are excluded before selection */
  minScore: number;
  maxContextRefs: number;
  /** Per-file excerpt cap used for context estimates */
  maxExcerptBytes: number;
  /** Context size that maps to the full -10 context-cost penalty */
  maxContextTokens: number;
  /** System prompt, framing and instructions added to every request */
  overheadTokens: number;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  weights: DEFAULT_WEIGHTS,
  minScore: 10,
  maxContextRefs: 10,
  maxExcerptBytes: 8192,
  maxContextTokens: 16_384,
  overheadTokens: 500,
};

/** Rough chars-per-token ratio used for every estimate */
export const BYTES_PER_TOKEN = 4;

/** Fixed per-call latency plus throughput assumptions behind time estimates */
const CALL_OVERHEAD_SECONDS = 5;
const OUTPUT_TOKENS_PER_SECOND = 40;
const INPUT_TOKENS_PER_SECOND = 2000;

/** Calibrates raw estimates, e.g. from the execution history */
export interface EstimateAdjuster {
  adjustTokens(tokens: number, family: ArtifactFamily, kind: "input" | "output"): number;
  /** undefined keeps the fixed throughput model */
  estimateSeconds(inputTokens: number, outputTokens: number): number | undefined;
}

export interface PlanInput {
  candidates: readonly CandidateProvider[];
  index: unknown;
  signals: unknown;
  budgets: Budgets;
  /** Restrict to these families; all when omitted */
  families?: readonly string[];
  config?: Partial<PlannerConfig>;
  estimator?: EstimateAdjuster;
}

/** A scored, costed candidate ready for selection */
export interface ScoredCandidate {
  provider: CandidateProvider;
  score: ScoreBreakdown;
  contextRefs: ContextRef[];
  /** Uncalibrated input estimate */
  inputTokens: number;
  /** Uncalibrated output estimate */
  outputTokens: number;
  estimatedTokens: number;
  estimatedSeconds: number;
}

export interface Selection {
  selected: ScoredCandidate[];
  skipped: Array<{ candidate: ScoredCandidate; reason: "over_token_budget" | "over_time_budget" }>;
  totals: Budgets;
}

/** Score desc, then estimated tokens asc, then name in code-unit order */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  return (
    b.score.totalScore - a.score.totalScore ||
    a.estimatedTokens - b.estimatedTokens ||
    compareStrings(a.provider.name, b.provider.name)
  );
}

/**
 * Greedy two-budget selection. Walks candidates in score order and takes each
 * one whose cost still fits both budgets. A candidate that does not fit is
 * skipped for good; cheaper later candidates may still be taken, but earlier
 * choices are never revisited to make room.
 */
export function selectGreedy(scored: readonly ScoredCandidate[], budgets: Budgets): Selection {
  const ordered = [...scored].sort(compareScored);
  const selected: ScoredCandidate[] = [];
  const skipped: Selection["skipped"] = [];
  let tokens = 0;
  let seconds = 0;

  for (const c of ordered) {
    if (tokens + c.estimatedTokens > budgets.tokens) {
      skipped.push({ candidate: c, reason: "over_token_budget" });
      continue;
    }
    if (seconds + c.estimatedSeconds > budgets.seconds) {
      skipped.push({ candidate: c, reason: "over_time_budget" });
      continue;
    }
    selected.push(c);
    tokens += c.estimatedTokens;
    seconds += c.estimatedSeconds;
  }

  return { selected, skipped, totals: { tokens, seconds } };
}

export function estimateSeconds(inputTokens: number, outputTokens: number): number {
  return (
    CALL_OVERHEAD_SECONDS +
    Math.ceil(outputTokens / OUTPUT_TOKENS_PER_SECOND) +
    Math.ceil(inputTokens / INPUT_TOKENS_PER_SECOND)
  );
}

function validateBudgets(budgets: Budgets): void {
  for (const [name, value] of Object.entries(budgets)) {
    if (!Number.isInteger(value) || value < 0) {
      throw new PlanInputError(`Budget "${name}" must be a non-negative integer (got ${value})`);
    }
  }
}

function resolveFamilies(families: readonly string[] | undefined): ArtifactFamily[] {
  if (families === undefined) return [...ARTIFACT_FAMILIES];
  const resolved: ArtifactFamily[] = [];
  for (const f of families) {
    const match = ARTIFACT_FAMILIES.find((k) => k === f);
    if (match === undefined) {
      throw new PlanInputError(`Unknown artifact family "${f}" (expected one of ${ARTIFACT_FAMILIES.join(", ")})`);
    }
    if (!resolved.includes(match)) resolved.push(match);
  }
  return resolved.sort((a, b) => ARTIFACT_FAMILIES.indexOf(a) - ARTIFACT_FAMILIES.indexOf(b));
}

function validateCandidates(candidates: readonly CandidateProvider[]): void {
  if (candidates.length === 0) throw new PlanInputError("Candidate catalog is empty");
  const names = new Set<string>();
  for (const c of candidates) {
    if (!c.name) throw new PlanInputError("Candidate with empty name in catalog");
    if (names.has(c.name)) throw new PlanInputError(`Duplicate candidate name: "${c.name}"`);
    if (!ARTIFACT_FAMILIES.includes(c.family)) {
      throw new PlanInputError(`Candidate "${c.name}" has unknown family "${c.family}"`);
    }
    if (!Number.isInteger(c.maxOutputTokens) || c.maxOutputTokens <= 0) {
      throw new PlanInputError(`Candidate "${c.name}" has invalid maxOutputTokens`);
    }
    for (const [key, value] of Object.entries(c.base)) {
      if (!Number.isFinite(value)) {
        throw new PlanInputError(`Candidate "${c.name}" has non-finite base weight "${key}"`);
      }
    }
    names.add(c.name);
  }
}

function applies(provider: CandidateProvider, signals: RepoSignals): boolean {
  return provider.requiredSignals.every((flag) => signals[flag]) && provider.isApplicable(signals);
}

function describeReason(provider: CandidateProvider, score: ScoreBreakdown): string {
  const factors: Array<[string, number]> = [
    ["high reusability", score.reusability],
    ["significant time savings", score.timeSaved],
    ["high leverage", score.leverage],
    ["addresses identified gaps", score.gapWeight],
  ];
  // First maximum wins so ties resolve the same way every time
  let top = factors[0] ?? ["", 0];
  for (const f of factors) if (f[1] > top[1]) top = f;
  const parts = [`Selected for ${top[0]} (${top[1].toFixed(1)})`];
  if (provider.requiredSignals.length > 0) {
    parts.push(`applies because the repository has: ${provider.requiredSignals.join(", ")}`);
  }
  return parts.join("; ");
}

/**
 * Score every applicable candidate and pick a budget-respecting subset.
 * Pure and synchronous; identical inputs always yield an identical Plan.
 */
export function plan(input: PlanInput): Plan {
  const config: PlannerConfig = { ...DEFAULT_PLANNER_CONFIG, ...input.config };

  const indexParse = RepoIndexSchema.safeParse(input.index);
  if (!indexParse.success) {
    throw new PlanInputError(`Invalid repo index: ${describeIssues(indexParse.error)}`);
  }
  const signalsParse = RepoSignalsSchema.safeParse(input.signals);
  if (!signalsParse.success) {
    throw new PlanInputError(`Invalid repo signals: ${describeIssues(signalsParse.error)}`);
  }
  const weightsParse = ScoreWeightsSchema.safeParse(config.weights);
  if (!weightsParse.success) {
    throw new PlanInputError(`Invalid score weights: ${describeIssues(weightsParse.error)}`);
  }
  const index: RepoIndex = indexParse.data;
  const signals: RepoSignals = signalsParse.data;
  const weights: ScoreWeights = weightsParse.data;

  validateBudgets(input.budgets);
  validateCandidates(input.candidates);
  const families = resolveFamilies(input.families);

  const scored: ScoredCandidate[] = [];
  for (const provider of input.candidates) {
    if (!families.includes(provider.family)) continue;
    if (!applies(provider, signals)) continue;

    const contextRefs = provider.selectContext(index, config.maxContextRefs, config.maxExcerptBytes);
    const contextTokens = contextRefs.reduce(
      (sum, ref) => sum + Math.floor(ref.maxBytes / BYTES_PER_TOKEN),
      0,
    );
    const score = scoreCandidate({
      provider,
      relevantFiles: provider.relevantFiles(index).length,
      contextTokens,
      maxContextTokens: config.maxContextTokens,
      gaps: signals.identifiedGaps,
      weights,
    });
    const inputTokens = contextTokens + config.overheadTokens;
    const outputTokens = provider.maxOutputTokens;
    const estimator = input.estimator;
    const adjustedInput = estimator ? estimator.adjustTokens(inputTokens, provider.family, "input") : inputTokens;
    const adjustedOutput = estimator ? estimator.adjustTokens(outputTokens, provider.family, "output") : outputTokens;
    scored.push({
      provider,
      score,
      contextRefs,
      inputTokens,
      outputTokens,
      estimatedTokens: adjustedInput + adjustedOutput,
      estimatedSeconds:
        estimator?.estimateSeconds(adjustedInput, adjustedOutput) ?? estimateSeconds(adjustedInput, adjustedOutput),
    });
  }

  const fileHashes = new Map(index.files.map((f) => [f.path, f.sha256]));
  const planId = sha256Hex(
    canonicalJson({
      repoName: index.repoName,
      files: [...fileHashes.entries()].sort(([a], [b]) => compareStrings(a, b)),
      signals,
      budgets: input.budgets,
      families,
      weights,
      minScore: config.minScore,
      candidates: input.candidates.map((c) => c.name).sort(compareStrings),
      // History calibration changes costs, so it changes the plan
      calibration: input.estimator
        ? scored
            .map((c): [string, number, number] => [c.provider.name, c.estimatedTokens, c.estimatedSeconds])
            .sort(([a], [b]) => compareStrings(a, b))
        : undefined,
    }),
  ).slice(0, 16);

  const excluded: ExcludedCandidate[] = [];
  const toExcluded = (c: ScoredCandidate, reason: ExcludedCandidate["reason"]): ExcludedCandidate => ({
    candidate: c.provider.name,
    family: c.provider.family,
    totalScore: c.score.totalScore,
    estimatedTokens: c.estimatedTokens,
    estimatedSeconds: c.estimatedSeconds,
    reason,
  });

  const eligible: ScoredCandidate[] = [];
  for (const c of [...scored].sort(compareScored)) {
    if (c.score.totalScore < config.minScore) excluded.push(toExcluded(c, "below_min_score"));
    else eligible.push(c);
  }

  const selection = selectGreedy(eligible, input.budgets);
  for (const s of selection.skipped) excluded.push(toExcluded(s.candidate, s.reason));

  const jobs: PlanJob[] = selection.selected.map((c) => ({
    id: sha256Hex(`${planId}:${c.provider.name}`).slice(0, 12),
    candidate: c.provider.name,
    family: c.provider.family,
    outputPath: c.provider.outputPath,
    maxOutputTokens: c.provider.maxOutputTokens,
    estimatedTokens: c.estimatedTokens,
    estimatedSeconds: c.estimatedSeconds,
    baseEstimate: { inputTokens: c.inputTokens, outputTokens: c.outputTokens },
    score: c.score,
    contextRefs: c.contextRefs,
    reason: describeReason(c.provider, c.score),
  }));

  return {
    schemaVersion: SCHEMA_VERSION,
    planId,
    repoName: index.repoName,
    budgets: { tokens: input.budgets.tokens, seconds: input.budgets.seconds },
    families,
    weights,
    minScore: config.minScore,
    jobs,
    excluded,
    totals: selection.totals,
  };
}
