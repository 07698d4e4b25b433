import { appendFileSync, statSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import type {
  JobOutcome,
  JobResult,
  JobState,
  JobTransition,
  OutcomeCounts,
  Report,
  SkipReason,
  TokenUsage,
} from "../../contracts/types.js";
import type { Reporter } from "./types.js";
import { ConfigError } from "../errors.js";
import { redact, truncate, MAX_OUTPUT_BYTES } from "../util/sanitize.js";

interface JobTransitionEvent {
  event: "job_transition";
  jobId: string;
  candidate: string;
  from: JobState;
  to: JobState;
  attempt?: number;
  usage: TokenUsage;
}

interface JobCompleteEvent {
  event: "job_complete";
  jobId: string;
  candidate: string;
  outcome: JobOutcome;
  attempts: number;
  usage: TokenUsage;
  skipReason?: SkipReason;
  error?: string;
}

interface RunCompleteEvent {
  event: "run_complete";
  runId: string;
  planId: string;
  cancelled: boolean;
  counts: OutcomeCounts;
  usage: TokenUsage;
  totalJobs: number;
}

type JsonReporterEventPayload = JobTransitionEvent | JobCompleteEvent | RunCompleteEvent;

type JsonReporterEvent = JsonReporterEventPayload & {
  timestamp: string;
};

function hasTraversalSegment(inputPath: string): boolean {
  return inputPath.split(/[\\/]+/).some((segment) => segment === "..");
}

function resolveReporterPath(filePath: string): string {
  if (hasTraversalSegment(filePath)) {
    throw new ConfigError(`Invalid reporter path: traversal segments are not allowed: "${filePath}"`);
  }

  const resolvedPath = resolve(filePath);
  if (!isAbsolute(filePath)) {
    const cwd = resolve(process.cwd());
    const rel = relative(cwd, resolvedPath);
    if (rel.startsWith("..") || isAbsolute(rel)) {
      throw new ConfigError(
        `Invalid reporter path: relative path resolves outside cwd "${cwd}": "${filePath}"`,
      );
    }
  }

  const parentDir = dirname(resolvedPath);
  let isDir: boolean;
  try {
    isDir = statSync(parentDir).isDirectory();
  } catch (err) {
    throw new ConfigError(`Invalid reporter path: parent directory does not exist: "${parentDir}"`, { cause: err });
  }
  if (!isDir) {
    throw new ConfigError(`Invalid reporter path: parent is not a directory: "${parentDir}"`);
  }

  return resolvedPath;
}

/** Appends one JSON object per event to a JSONL file */
export function createJsonReporter(
  filePath: string,
  env: Record<string, string | undefined>,
  now: () => Date = () => new Date(),
): Reporter {
  const resolvedPath = resolveReporterPath(filePath);

  function sanitize(text: string): string {
    return truncate(redact(text, env), MAX_OUTPUT_BYTES);
  }

  function append(event: JsonReporterEventPayload): void {
    const payload: JsonReporterEvent = {
      timestamp: now().toISOString(),
      ...event,
    };
    appendFileSync(resolvedPath, JSON.stringify(payload) + "\n", "utf8");
  }

  return {
    jobTransition(t: JobTransition): void {
      const event: JobTransitionEvent = {
        event: "job_transition",
        jobId: t.jobId,
        candidate: t.candidate,
        from: t.from,
        to: t.to,
        usage: t.usage,
      };
      if (t.attempt !== undefined) event.attempt = t.attempt;
      append(event);
    },

    jobComplete(result: JobResult): void {
      const event: JobCompleteEvent = {
        event: "job_complete",
        jobId: result.jobId,
        candidate: result.candidate,
        outcome: result.outcome,
        attempts: result.attempts,
        usage: result.usage,
      };
      if (result.skipReason !== undefined) event.skipReason = result.skipReason;
      if (result.error !== undefined) event.error = sanitize(result.error);
      append(event);
    },

    runComplete(report: Report): void {
      append({
        event: "run_complete",
        runId: report.runId,
        planId: report.planId,
        cancelled: report.cancelled,
        counts: report.counts,
        usage: report.usage,
        totalJobs: report.totalJobs,
      });
    },
  };
}
