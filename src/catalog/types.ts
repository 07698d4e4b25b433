import type {
  ArtifactFamily,
  ContextRef,
  PlanJob,
  RepoIndex,
  RepoSignals,
  SignalFlag,
} from "../../contracts/types.js";

/** Static value estimates on a 0–10 scale */
export interface BaseWeights {
  reusability: number;
  timeSaved: number;
  leverage: number;
}

/** A path rule used to pick context files for a candidate */
export interface ContextPattern {
  match: RegExp;
  reason: string;
}

export interface PromptInput {
  /** Packaged, already-redacted repository excerpts */
  context: string;
  job: PlanJob;
}

export interface PromptParts {
  system: string;
  user: string;
}

/**
 * Capability every artifact candidate implements: applicability,
 * cost/value estimates, context selection and prompt construction.
 */
export interface CandidateProvider {
  readonly name: string;
  readonly family: ArtifactFamily;
  readonly description: string;
  /** Path of the generated artifact, relative to the artifacts directory */
  readonly outputPath: string;
  readonly maxOutputTokens: number;
  readonly base: BaseWeights;
  /** Every flag must be true in the signals for the candidate to apply */
  readonly requiredSignals: readonly SignalFlag[];
  /** Gap descriptions (substring, case-insensitive) that raise this candidate's weight */
  readonly boostedByGaps: readonly string[];
  readonly contextPatterns: readonly ContextPattern[];
  /** Extra applicability rule evaluated after `requiredSignals` */
  isApplicable(signals: RepoSignals): boolean;
  /** Files in the index this candidate considers relevant, in index order */
  relevantFiles(index: RepoIndex): string[];
  selectContext(index: RepoIndex, maxRefs: number, maxBytes: number): ContextRef[];
  buildPrompt(input: PromptInput): PromptParts;
  /** Rewrite this candidate's generated text before any registered post-processor */
  postProcess?(content: string): string;
}

export interface PostProcessContext {
  job: PlanJob;
}

/** Rewrites generated text before it is written as an artifact */
export interface PostProcessor {
  readonly name: string;
  /** Lower runs first; 0 when omitted */
  readonly priority?: number;
  /** Families this applies to; every family when omitted */
  readonly families?: readonly ArtifactFamily[];
  process(content: string, context: PostProcessContext): string | Promise<string>;
}
