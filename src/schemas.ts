import { z } from "zod";
import { ARTIFACT_FAMILIES, SCHEMA_VERSION } from "../contracts/types.js";

const nonNegInt = z.number().int().nonnegative();
const sha256 = z.string().regex(/^[0-9a-f]{64}$/, "expected 64 lowercase hex characters");

export const FileEntrySchema = z.object({
  path: z.string().min(1),
  sizeBytes: nonNegInt,
  sha256,
  isBinary: z.boolean().default(false),
});

export const RepoIndexSchema = z.object({
  repoName: z.string().min(1),
  files: z.array(FileEntrySchema),
});

export const RepoSignalsSchema = z.object({
  primaryLanguage: z.string().optional(),
  frameworks: z.array(z.string()).default([]),
  hasApi: z.boolean().default(false),
  hasWebUi: z.boolean().default(false),
  hasCli: z.boolean().default(false),
  hasDatabase: z.boolean().default(false),
  hasAuth: z.boolean().default(false),
  identifiedGaps: z.array(z.string()).default([]),
});

export const ArtifactFamilySchema = z.enum(ARTIFACT_FAMILIES);

const BudgetsSchema = z.object({
  tokens: nonNegInt,
  seconds: nonNegInt,
});

export const ScoreWeightsSchema = z.object({
  reusability: z.number().finite(),
  timeSaved: z.number().finite(),
  leverage: z.number().finite(),
  contextCost: z.number().finite(),
  gapWeight: z.number().finite(),
});

const ScoreBreakdownSchema = z.object({
  reusability: z.number(),
  timeSaved: z.number(),
  leverage: z.number(),
  contextCost: z.number().max(0),
  gapWeight: z.number(),
  totalScore: z.number(),
});

const ContextRefSchema = z.object({
  path: z.string().min(1),
  maxBytes: nonNegInt,
  reason: z.string(),
});

const TokenUsageSchema = z.object({
  inputTokens: nonNegInt,
  outputTokens: nonNegInt,
});

const PlanJobSchema = z.object({
  id: z.string().min(1),
  candidate: z.string().min(1),
  family: ArtifactFamilySchema,
  outputPath: z.string().min(1),
  maxOutputTokens: z.number().int().positive(),
  estimatedTokens: nonNegInt,
  estimatedSeconds: nonNegInt,
  baseEstimate: TokenUsageSchema,
  score: ScoreBreakdownSchema,
  contextRefs: z.array(ContextRefSchema),
  reason: z.string(),
});

export const PlanSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  planId: z.string().min(1),
  repoName: z.string().min(1),
  budgets: BudgetsSchema,
  families: z.array(ArtifactFamilySchema),
  weights: ScoreWeightsSchema,
  minScore: z.number(),
  jobs: z.array(PlanJobSchema),
  excluded: z.array(
    z.object({
      candidate: z.string(),
      family: ArtifactFamilySchema,
      totalScore: z.number(),
      estimatedTokens: nonNegInt,
      estimatedSeconds: nonNegInt,
      reason: z.enum(["below_min_score", "over_token_budget", "over_time_budget"]),
    }),
  ),
  totals: BudgetsSchema,
});

export const CacheEntrySchema = z.object({
  fingerprint: sha256,
  model: z.string(),
  text: z.string(),
  usage: TokenUsageSchema,
  createdAt: z.string().datetime(),
});

const JobResultSchema = z.object({
  jobId: z.string().min(1),
  candidate: z.string(),
  outcome: z.enum(["completed", "skipped", "failed"]),
  fingerprint: sha256.optional(),
  attempts: nonNegInt,
  usage: TokenUsageSchema,
  error: z.string().optional(),
  skipReason: z.enum(["cache_hit", "prior_run"]).optional(),
  artifactPath: z.string().optional(),
  redactions: nonNegInt,
});

export const ReportSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  runId: z.string(),
  planId: z.string(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime(),
  cancelled: z.boolean(),
  totalJobs: nonNegInt,
  counts: z.object({
    completed: nonNegInt,
    skipped: nonNegInt,
    failed: nonNegInt,
  }),
  usage: TokenUsageSchema,
  redactionSummary: z.record(nonNegInt),
  results: z.array(JobResultSchema),
});

export const ExecutionRecordSchema = z.object({
  jobId: z.string().min(1),
  candidate: z.string(),
  family: ArtifactFamilySchema,
  repoName: z.string(),
  model: z.string(),
  timestamp: z.string().datetime(),
  estimatedInputTokens: nonNegInt,
  estimatedOutputTokens: nonNegInt,
  actualInputTokens: nonNegInt,
  actualOutputTokens: nonNegInt,
  durationSeconds: z.number().nonnegative(),
  contextBytes: nonNegInt,
  success: z.boolean(),
});

/** Short, single-line description of the first few problems in a zod error */
export function describeIssues(err: z.ZodError): string {
  return err.issues
    .slice(0, 5)
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}
