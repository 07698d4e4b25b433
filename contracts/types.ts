/** Unique run identifier — 8-char hex string */
export type RunId = string;

/** Bumped on any incompatible change to a persisted plan or report */
export const SCHEMA_VERSION = 1;

// ---------------------------------------------------------------------------
// Repository snapshot (produced by an external scanner, read-only here)
// ---------------------------------------------------------------------------

export interface FileEntry {
  /** Path relative to the repository root, forward slashes */
  path: string;
  sizeBytes: number;
  sha256: string;
  isBinary: boolean;
}

export interface RepoIndex {
  repoName: string;
  files: FileEntry[];
}

/** Facts detected about the repository. Boolean flags gate candidates. */
export interface RepoSignals {
  primaryLanguage?: string;
  frameworks: string[];
  hasApi: boolean;
  hasWebUi: boolean;
  hasCli: boolean;
  hasDatabase: boolean;
  hasAuth: boolean;
  identifiedGaps: string[];
}

export type SignalFlag = "hasApi" | "hasWebUi" | "hasCli" | "hasDatabase" | "hasAuth";

// ---------------------------------------------------------------------------
// Secret redaction
// ---------------------------------------------------------------------------

export type Severity = "critical" | "high" | "medium" | "low" | "informational";

/** One detected candidate. Never carries the matched text. */
export interface RedactionEntry {
  pattern: string;
  severity: Severity;
  /** UTF-8 byte offset of the match start in the original text */
  start: number;
  /** UTF-8 byte offset one past the match end */
  end: number;
  length: number;
  confidence: number;
  /** false for informational findings below the confidence threshold */
  redacted: boolean;
}

export interface RedactionReport {
  source: string;
  entries: readonly RedactionEntry[];
  total: number;
  redactedCount: number;
  /** Input could not be classified; its content was withheld entirely */
  unscannable: boolean;
  patternCounts: Readonly<Record<string, number>>;
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export const ARTIFACT_FAMILIES = [
  "docs",
  "security",
  "tests",
  "api",
  "observability",
  "product",
] as const;

export type ArtifactFamily = (typeof ARTIFACT_FAMILIES)[number];

/** A file excerpt a job wants in its packaged context */
export interface ContextRef {
  path: string;
  maxBytes: number;
  reason: string;
}

export interface ScoreBreakdown {
  reusability: number;
  timeSaved: number;
  leverage: number;
  /** Penalty, always <= 0 */
  contextCost: number;
  gapWeight: number;
  totalScore: number;
}

export interface ScoreWeights {
  reusability: number;
  timeSaved: number;
  leverage: number;
  contextCost: number;
  gapWeight: number;
}

export interface Budgets {
  tokens: number;
  seconds: number;
}

export interface PlanJob {
  id: string;
  /** Name of the candidate provider that builds this job's prompt */
  candidate: string;
  family: ArtifactFamily;
  /** Artifact path relative to the run's artifacts directory */
  outputPath: string;
  maxOutputTokens: number;
  estimatedTokens: number;
  estimatedSeconds: number;
  /** Estimate before history calibration; execution ratios are measured against it */
  baseEstimate: TokenUsage;
  score: ScoreBreakdown;
  contextRefs: ContextRef[];
  reason: string;
}

export type ExclusionReason = "below_min_score" | "over_token_budget" | "over_time_budget";

export interface ExcludedCandidate {
  candidate: string;
  family: ArtifactFamily;
  totalScore: number;
  estimatedTokens: number;
  estimatedSeconds: number;
  reason: ExclusionReason;
}

/** Value object: same inputs → identical serialization */
export interface Plan {
  schemaVersion: number;
  planId: string;
  repoName: string;
  budgets: Budgets;
  families: ArtifactFamily[];
  weights: ScoreWeights;
  minScore: number;
  jobs: PlanJob[];
  excluded: ExcludedCandidate[];
  totals: Budgets;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

/** Token usage from a generation call */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CacheEntry {
  fingerprint: string;
  model: string;
  text: string;
  usage: TokenUsage;
  /** ISO 8601 */
  createdAt: string;
}

export type JobOutcome = "completed" | "skipped" | "failed";

export type SkipReason = "cache_hit" | "prior_run";

export type JobState =
  | "pending"
  | "context-built"
  | "fingerprinted"
  | "calling"
  | "completed"
  | "skipped"
  | "failed";

export interface JobResult {
  jobId: string;
  candidate: string;
  outcome: JobOutcome;
  /** Absent only when the job failed before its request could be assembled */
  fingerprint?: string;
  /** Generation calls made for this job in this run */
  attempts: number;
  usage: TokenUsage;
  error?: string;
  skipReason?: SkipReason;
  artifactPath?: string;
  /** Secret candidates redacted from this job's context */
  redactions: number;
}

export interface OutcomeCounts {
  completed: number;
  skipped: number;
  failed: number;
}

/** Full report for a run */
export interface Report {
  schemaVersion: number;
  runId: RunId;
  planId: string;
  /** ISO 8601 */
  startedAt: string;
  /** ISO 8601 */
  completedAt: string;
  cancelled: boolean;
  totalJobs: number;
  counts: OutcomeCounts;
  /** Usage of calls made in this run only */
  usage: TokenUsage;
  /** Redacted-entry counts per pattern across every packaged context */
  redactionSummary: Record<string, number>;
  /** In plan order, one per job that was processed */
  results: JobResult[];
}

/** Emitted once per job state transition */
export interface JobTransition {
  jobId: string;
  candidate: string;
  from: JobState;
  to: JobState;
  /** Present on `calling` transitions */
  attempt?: number;
  /** Running usage total across the run at the time of the transition */
  usage: TokenUsage;
}

// ---------------------------------------------------------------------------
// Subprocesses
// ---------------------------------------------------------------------------

/** One generation call as remembered across runs; feeds estimate calibration */
export interface ExecutionRecord {
  jobId: string;
  candidate: string;
  family: ArtifactFamily;
  repoName: string;
  model: string;
  /** ISO-8601 */
  timestamp: string;
  estimatedInputTokens: number;
  estimatedOutputTokens: number;
  actualInputTokens: number;
  actualOutputTokens: number;
  durationSeconds: number;
  contextBytes: number;
  success: boolean;
}

/** Options for spawning a subprocess */
export interface ExecOptions {
  /** Command as argv array, never a shell string */
  argv: string[];
  cwd: string;
  timeout: number;
  env?: Record<string, string>;
  /** Max output bytes to capture (default 50KB) */
  maxOutput?: number;
  /** Kills the child when aborted */
  signal?: AbortSignal;
}

/** Result of a subprocess execution */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}
