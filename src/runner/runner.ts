import { stat } from "node:fs/promises";
import { performance } from "node:perf_hooks";
import { join } from "node:path";
import {
  SCHEMA_VERSION,
  type CacheEntry,
  type JobResult,
  type JobState,
  type JobTransition,
  type Plan,
  type PlanJob,
  type RedactionReport,
  type Report,
  type TokenUsage,
} from "../../contracts/types.js";
import type { ResponseCache } from "../cache/store.js";
import { fingerprintOf } from "../cache/fingerprint.js";
import type { CandidateRegistry } from "../catalog/registry.js";
import type { CandidateProvider } from "../catalog/types.js";
import { errorMessage, isCacheError } from "../errors.js";
import type { Generator } from "../generator/types.js";
import type { HistoryRecorder } from "../history/history.js";
import { createSecretGuard, summarizeRedactions, type SecretGuard } from "../guard/secret-guard.js";
import { errnoCode, writeFileAtomic } from "../util/fs.js";
import { resolveConfined } from "../util/path.js";
import { generateRunId } from "../util/preflight.js";
import { packageContext, type FileSource, type PackagedContext } from "./context.js";
import { KeyedMutex } from "./lock.js";
import { REPORT_FILE, addUsage, countOutcomes, loadReport, saveReport } from "./report.js";
import { DEFAULT_RETRY_POLICY, defaultSleep, generateWithRetry, type RetryPolicy, type Sleep } from "./retry.js";

export interface RunnerConfig {
  model: string;
  temperature: number;
  /** Jobs in flight at once */
  concurrency: number;
  retry: RetryPolicy;
  maxExcerptBytes: number;
  maxTotalContextBytes: number;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  model: "claude-sonnet-4-5",
  temperature: 0,
  concurrency: 1,
  retry: DEFAULT_RETRY_POLICY,
  maxExcerptBytes: 8192,
  maxTotalContextBytes: 65_536,
};

/** Called synchronously once per state transition */
export type ProgressSink = (transition: JobTransition) => void;

export interface RunOptions {
  /** Holds report.json and artifacts/ */
  outputDir: string;
  cache: ResponseCache;
  generator: Generator;
  /** Resolves each job's candidate to its prompt builder */
  registry: CandidateRegistry;
  source: FileSource;
  config?: Partial<RunnerConfig>;
  guard?: SecretGuard;
  progress?: ProgressSink;
  /** Fired once per job with its final result */
  onJobResult?: (result: JobResult) => void;
  /** Receives whatever `progress`, `onJobResult` or `history` throw; the run carries on regardless */
  onObserverError?: (err: unknown) => void;
  /** Every generation call is recorded here */
  history?: HistoryRecorder;
  /** Stop starting new jobs once aborted */
  signal?: AbortSignal;
  sleep?: Sleep;
  runId?: string;
  now?: () => Date;
}

export const ARTIFACTS_DIR = "artifacts";

interface ArtifactMeta {
  jobId: string;
  candidate: string;
  fingerprint: string;
  model: string;
  usage: TokenUsage;
  files: string[];
  excluded: PackagedContext["excluded"];
  redactions: RedactionReport[];
}

/** What a job has reached so far; fills in the result when it throws */
interface JobProgress {
  state: JobState;
  fingerprint?: string;
  attempts: number;
  usage: TokenUsage;
  redactions: number;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

/** The candidate's own hook first, then registered processors by priority */
async function postProcess(
  text: string,
  provider: CandidateProvider,
  registry: CandidateRegistry,
  job: PlanJob,
): Promise<string> {
  let out = provider.postProcess ? provider.postProcess(text) : text;
  for (const processor of registry.postProcessorsFor(job.family)) {
    try {
      out = await processor.process(out, { job });
    } catch (err) {
      throw new Error(`Post-processor "${processor.name}" failed: ${errorMessage(err)}`, { cause: err });
    }
  }
  return out;
}

async function writeArtifact(path: string, text: string, meta: ArtifactMeta): Promise<void> {
  await writeFileAtomic(path, text);
  await writeFileAtomic(`${path}.meta.json`, JSON.stringify(meta, null, 2) + "\n");
}

/**
 * Execute a plan. Jobs go through
 * pending → context-built → fingerprinted → (skipped | calling → completed | failed).
 * Results come back in plan order whatever order jobs finish in. A job
 * that throws is recorded as failed and the run moves on; only cache
 * failures stop the run, once in-flight jobs settle, and are rethrown.
 */
export async function runPlan(plan: Plan, opts: RunOptions): Promise<Report> {
  const config: RunnerConfig = { ...DEFAULT_RUNNER_CONFIG, ...opts.config };
  const guard = opts.guard ?? createSecretGuard();
  const sleep = opts.sleep ?? defaultSleep;
  const now = opts.now ?? (() => new Date());
  const runId = opts.runId ?? generateRunId();
  const reportPath = join(opts.outputDir, REPORT_FILE);
  const artifactsRoot = join(opts.outputDir, ARTIFACTS_DIR);

  const prior = await loadReport(reportPath);
  const priorCompleted = new Map<string, JobResult>();
  if (prior && prior.planId === plan.planId) {
    for (const r of prior.results) {
      if (r.outcome === "completed" || r.skipReason === "prior_run") priorCompleted.set(r.jobId, r);
    }
  }

  const startedAt = now().toISOString();
  const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  const results: Array<JobResult | undefined> = plan.jobs.map(() => undefined);
  const redactionReports: RedactionReport[] = [];
  const fingerprintLock = new KeyedMutex();
  const reportLock = new KeyedMutex();
  let fatal: unknown;
  let next = 0;

  const snapshot = (): Report => {
    const done = results.filter((r): r is JobResult => r !== undefined);
    return {
      schemaVersion: SCHEMA_VERSION,
      runId,
      planId: plan.planId,
      startedAt,
      completedAt: now().toISOString(),
      cancelled: opts.signal?.aborted === true && done.length < plan.jobs.length,
      totalJobs: plan.jobs.length,
      counts: countOutcomes(done),
      usage: { ...usage },
      redactionSummary: summarizeRedactions(redactionReports),
      results: done,
    };
  };

  const observe = (fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      opts.onObserverError?.(err);
    }
  };

  const persist = (): Promise<Report> =>
    reportLock.run("report", async () => {
      const report = snapshot();
      await saveReport(reportPath, report);
      return report;
    });

  async function processJob(job: PlanJob): Promise<JobResult> {
    const progress: JobProgress = {
      state: "pending",
      attempts: 0,
      usage: { inputTokens: 0, outputTokens: 0 },
      redactions: 0,
    };
    const move = (to: JobState, attempt?: number): void => {
      const from = progress.state;
      progress.state = to;
      observe(() =>
        opts.progress?.({ jobId: job.id, candidate: job.candidate, from, to, attempt, usage: { ...usage } }),
      );
    };
    try {
      return await attemptJob(job, move, progress);
    } catch (err) {
      if (isCacheError(err)) throw err;
      move("failed");
      return {
        jobId: job.id,
        candidate: job.candidate,
        outcome: "failed",
        fingerprint: progress.fingerprint,
        attempts: progress.attempts,
        usage: progress.usage,
        error: errorMessage(err),
        redactions: progress.redactions,
      };
    }
  }

  async function attemptJob(
    job: PlanJob,
    move: (to: JobState, attempt?: number) => void,
    progress: JobProgress,
  ): Promise<JobResult> {
    const base = { jobId: job.id, candidate: job.candidate };
    const zero = (): TokenUsage => ({ inputTokens: 0, outputTokens: 0 });

    const provider = opts.registry.get(job.candidate);
    if (!provider) {
      move("failed");
      return {
        ...base,
        outcome: "failed",
        attempts: 0,
        usage: zero(),
        error: `Unknown candidate "${job.candidate}"`,
        redactions: 0,
      };
    }

    let artifactPath: string;
    try {
      artifactPath = resolveConfined(artifactsRoot, job.outputPath);
    } catch (err) {
      move("failed");
      return { ...base, outcome: "failed", attempts: 0, usage: zero(), error: errorMessage(err), redactions: 0 };
    }

    const packaged = await packageContext(job.contextRefs, opts.source, guard, config);
    redactionReports.push(...packaged.reports);
    progress.redactions = packaged.redactions;
    move("context-built");

    const prompt = provider.buildPrompt({ context: packaged.text, job });
    const fingerprint = fingerprintOf({
      model: config.model,
      system: prompt.system,
      user: prompt.user,
      maxTokens: job.maxOutputTokens,
      temperature: config.temperature,
    });
    progress.fingerprint = fingerprint;
    move("fingerprinted");

    const meta = (model: string, callUsage: TokenUsage): ArtifactMeta => ({
      jobId: job.id,
      candidate: job.candidate,
      fingerprint,
      model,
      usage: callUsage,
      files: packaged.files,
      excluded: packaged.excluded,
      redactions: packaged.reports,
    });
    const relativeArtifact = join(ARTIFACTS_DIR, job.outputPath);

    const priorResult = priorCompleted.get(job.id);
    if (priorResult && (priorResult.fingerprint === undefined || priorResult.fingerprint === fingerprint)) {
      move("skipped");
      return {
        ...base,
        outcome: "skipped",
        skipReason: "prior_run",
        fingerprint,
        attempts: 0,
        usage: zero(),
        artifactPath: priorResult.artifactPath ?? relativeArtifact,
        redactions: packaged.redactions,
      };
    }

    return fingerprintLock.run(fingerprint, async (): Promise<JobResult> => {
      if (await opts.cache.has(fingerprint)) {
        if (!(await exists(artifactPath))) {
          const entry = await opts.cache.get(fingerprint);
          if (entry) {
            const text = await postProcess(entry.text, provider, opts.registry, job);
            await writeArtifact(artifactPath, text, meta(entry.model, entry.usage));
          }
        }
        move("skipped");
        return {
          ...base,
          outcome: "skipped",
          skipReason: "cache_hit",
          fingerprint,
          attempts: 0,
          usage: zero(),
          artifactPath: relativeArtifact,
          redactions: packaged.redactions,
        };
      }

      let attemptStarted = performance.now();
      const outcome = await generateWithRetry(
        opts.generator,
        {
          systemPrompt: prompt.system,
          userPrompt: prompt.user,
          model: config.model,
          maxTokens: job.maxOutputTokens,
          temperature: config.temperature,
        },
        config.retry,
        {
          sleep,
          onAttempt: (attempt) => {
            attemptStarted = performance.now();
            progress.attempts = attempt;
            move("calling", attempt);
          },
          onUsage: (callUsage) => {
            addUsage(usage, callUsage);
            addUsage(progress.usage, callUsage);
          },
        },
      );

      if (opts.history) {
        try {
          await opts.history.record({
            jobId: job.id,
            candidate: job.candidate,
            family: job.family,
            repoName: plan.repoName,
            model: config.model,
            timestamp: now().toISOString(),
            estimatedInputTokens: job.baseEstimate.inputTokens,
            estimatedOutputTokens: job.baseEstimate.outputTokens,
            actualInputTokens: outcome.usage.inputTokens,
            actualOutputTokens: outcome.usage.outputTokens,
            durationSeconds: Math.round(performance.now() - attemptStarted) / 1000,
            contextBytes: Buffer.byteLength(packaged.text, "utf8"),
            success: outcome.status === "completed",
          });
        } catch (err) {
          opts.onObserverError?.(err);
        }
      }

      if (outcome.status === "failed") {
        move("failed");
        return {
          ...base,
          outcome: "failed",
          fingerprint,
          attempts: outcome.attempts,
          usage: outcome.usage,
          error: outcome.error,
          redactions: packaged.redactions,
        };
      }

      const entry: CacheEntry = {
        fingerprint,
        model: config.model,
        text: outcome.response.text,
        usage: outcome.usage,
        createdAt: now().toISOString(),
      };
      await opts.cache.put(entry);

      const text = await postProcess(entry.text, provider, opts.registry, job);
      try {
        await writeArtifact(artifactPath, text, meta(entry.model, entry.usage));
      } catch (err) {
        move("failed");
        return {
          ...base,
          outcome: "failed",
          fingerprint,
          attempts: outcome.attempts,
          usage: outcome.usage,
          error: `Cannot write artifact: ${errorMessage(err)}`,
          redactions: packaged.redactions,
        };
      }

      move("completed");
      return {
        ...base,
        outcome: "completed",
        fingerprint,
        attempts: outcome.attempts,
        usage: outcome.usage,
        artifactPath: relativeArtifact,
        redactions: packaged.redactions,
      };
    });
  }

  async function worker(): Promise<void> {
    while (fatal === undefined && opts.signal?.aborted !== true) {
      const index = next++;
      const job = plan.jobs[index];
      if (!job) return;
      try {
        const result = await processJob(job);
        results[index] = result;
        observe(() => opts.onJobResult?.(result));
        await persist();
      } catch (err) {
        if (isCacheError(err)) {
          fatal ??= err;
          return;
        }
        throw err;
      }
    }
  }

  const workers = Math.max(1, Math.min(config.concurrency, plan.jobs.length));
  const settled = await Promise.allSettled(Array.from({ length: workers }, () => worker()));
  const report = await persist();

  if (fatal !== undefined) throw fatal;
  for (const s of settled) {
    if (s.status === "rejected") throw s.reason;
  }
  return report;
}
