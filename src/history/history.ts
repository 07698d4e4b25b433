import { appendFile, mkdir, readFile, rm } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { ArtifactFamily, ExecutionRecord } from "../../contracts/types.js";
import { ConfigError, errorMessage } from "../errors.js";
import type { EstimateAdjuster } from "../planner/planner.js";
import { ExecutionRecordSchema, describeIssues } from "../schemas.js";
import { errnoCode } from "../util/fs.js";

export const HISTORY_FILE = "history.jsonl";

/** Below this many records in the window, estimates are left alone */
export const MIN_EXECUTIONS = 10;
/** Share of the observed error an adjustment corrects */
export const DAMPENING = 0.7;
export const DEFAULT_MAX_AGE_DAYS = 90;
const DAY_MS = 86_400_000;

export interface RatioStats {
  mean: number;
  /** Sample standard deviation; 0 with fewer than two ratios */
  std: number;
}

export interface FamilyStats {
  count: number;
  successRate: number;
  inputRatio: number;
  outputRatio: number;
}

export interface HistoryStats {
  totalExecutions: number;
  successRate: number;
  /** actual / estimated input tokens over successful calls */
  inputRatio: RatioStats;
  outputRatio: RatioStats;
  avgDurationSeconds: number;
  /** Output tokens per second of generation time; 0 when unknown */
  tokensPerSecond: number;
  families: Partial<Record<ArtifactFamily, FamilyStats>>;
}

/** Sink the runner reports each generation call to */
export interface HistoryRecorder {
  record(record: ExecutionRecord): Promise<void>;
}

export interface HistoryOptions {
  /** Records older than this are ignored by the statistics */
  maxAgeDays?: number;
  now?: () => Date;
}

const mean = (xs: readonly number[]): number =>
  xs.length === 0 ? 0 : xs.reduce((a, b) => a + b, 0) / xs.length;

function ratioStats(xs: readonly number[]): RatioStats {
  if (xs.length === 0) return { mean: 1, std: 0 };
  const m = mean(xs);
  if (xs.length < 2) return { mean: m, std: 0 };
  const variance = xs.reduce((sum, x) => sum + (x - m) ** 2, 0) / (xs.length - 1);
  return { mean: m, std: Math.sqrt(variance) };
}

function ratios(records: readonly ExecutionRecord[], kind: "input" | "output"): number[] {
  const out: number[] = [];
  for (const r of records) {
    const estimated = kind === "input" ? r.estimatedInputTokens : r.estimatedOutputTokens;
    const actual = kind === "input" ? r.actualInputTokens : r.actualOutputTokens;
    if (estimated > 0) out.push(actual / estimated);
  }
  return out;
}

export function emptyStats(): HistoryStats {
  return {
    totalExecutions: 0,
    successRate: 0,
    inputRatio: { mean: 1, std: 0 },
    outputRatio: { mean: 1, std: 0 },
    avgDurationSeconds: 0,
    tokensPerSecond: 0,
    families: {},
  };
}

export function computeStats(records: readonly ExecutionRecord[]): HistoryStats {
  if (records.length === 0) return emptyStats();
  const successes = records.filter((r) => r.success);

  const totalOutput = successes.reduce((sum, r) => sum + r.actualOutputTokens, 0);
  const totalSeconds = successes.reduce((sum, r) => sum + r.durationSeconds, 0);

  const families: HistoryStats["families"] = {};
  for (const family of new Set(records.map((r) => r.family))) {
    const all = records.filter((r) => r.family === family);
    const ok = all.filter((r) => r.success);
    families[family] = {
      count: all.length,
      successRate: ok.length / all.length,
      inputRatio: ratioStats(ratios(ok, "input")).mean,
      outputRatio: ratioStats(ratios(ok, "output")).mean,
    };
  }

  return {
    totalExecutions: records.length,
    successRate: successes.length / records.length,
    inputRatio: ratioStats(ratios(successes, "input")),
    outputRatio: ratioStats(ratios(successes, "output")),
    avgDurationSeconds: mean(successes.map((r) => r.durationSeconds).filter((s) => s > 0)),
    tokensPerSecond: totalSeconds > 0 ? totalOutput / totalSeconds : 0,
    families,
  };
}

/**
 * Append-only JSONL log of generation calls. Calibrates planner estimates
 * once enough calls have been seen: the observed actual/estimated ratio is
 * applied with dampening, per family where the family has records.
 */
export class ExecutionHistory implements HistoryRecorder, EstimateAdjuster {
  readonly path: string;
  /** Lines that did not parse as records; they are kept in the file but ignored */
  readonly skippedLines: number;
  private readonly entries: ExecutionRecord[];
  private readonly maxAgeDays: number;
  private readonly now: () => Date;
  private cached: HistoryStats | undefined;

  private constructor(path: string, entries: ExecutionRecord[], skippedLines: number, opts: HistoryOptions) {
    this.path = path;
    this.entries = entries;
    this.skippedLines = skippedLines;
    this.maxAgeDays = opts.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
    this.now = opts.now ?? (() => new Date());
  }

  /** A missing file is an empty history */
  static async load(path: string, opts: HistoryOptions = {}): Promise<ExecutionHistory> {
    const target = resolve(path);
    let raw = "";
    try {
      raw = await readFile(target, "utf8");
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") {
        throw new ConfigError(`Cannot read history ${target}: ${errorMessage(err)}`, { cause: err });
      }
    }

    const entries: ExecutionRecord[] = [];
    let skipped = 0;
    for (const line of raw.split("\n")) {
      if (line.trim() === "") continue;
      const parsed = parseLine(line);
      if (parsed) entries.push(parsed);
      else skipped++;
    }
    return new ExecutionHistory(target, entries, skipped, opts);
  }

  get records(): readonly ExecutionRecord[] {
    return this.entries;
  }

  async record(record: ExecutionRecord): Promise<void> {
    const parsed = ExecutionRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ConfigError(`Invalid execution record: ${describeIssues(parsed.error)}`);
    }
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, JSON.stringify(parsed.data) + "\n", "utf8");
    this.entries.push(parsed.data);
    this.cached = undefined;
  }

  /** Statistics over records inside the age window */
  stats(): HistoryStats {
    if (!this.cached) {
      const cutoff = this.now().getTime() - this.maxAgeDays * DAY_MS;
      this.cached = computeStats(this.entries.filter((r) => Date.parse(r.timestamp) > cutoff));
    }
    return this.cached;
  }

  adjustTokens(tokens: number, family: ArtifactFamily, kind: "input" | "output"): number {
    const stats = this.stats();
    if (stats.totalExecutions < MIN_EXECUTIONS) return tokens;
    const familyStats = stats.families[family];
    const ratio = familyStats
      ? kind === "input"
        ? familyStats.inputRatio
        : familyStats.outputRatio
      : kind === "input"
        ? stats.inputRatio.mean
        : stats.outputRatio.mean;
    return Math.floor(tokens * (1 + (ratio - 1) * DAMPENING));
  }

  /** Observed throughput once history is deep enough; undefined otherwise */
  estimateSeconds(_inputTokens: number, outputTokens: number): number | undefined {
    const stats = this.stats();
    if (stats.totalExecutions < MIN_EXECUTIONS || stats.tokensPerSecond <= 0) return undefined;
    return Math.ceil(outputTokens / stats.tokensPerSecond);
  }

  /** One line per figure, for `docsmith history` */
  summary(): string[] {
    const s = this.stats();
    if (s.totalExecutions === 0) return ["No execution history"];
    const lines = [
      `Executions: ${s.totalExecutions} (last ${this.maxAgeDays} days)`,
      `Success rate: ${(s.successRate * 100).toFixed(1)}%`,
      `Input tokens: ${s.inputRatio.mean.toFixed(2)}x estimate (±${s.inputRatio.std.toFixed(2)})`,
      `Output tokens: ${s.outputRatio.mean.toFixed(2)}x estimate (±${s.outputRatio.std.toFixed(2)})`,
      `Average generation time: ${s.avgDurationSeconds.toFixed(1)}s`,
      `Throughput: ${s.tokensPerSecond.toFixed(1)} output tokens/s`,
    ];
    for (const [family, f] of Object.entries(s.families)) {
      if (!f) continue;
      lines.push(
        `  ${family}: ${f.count} runs, ${(f.successRate * 100).toFixed(0)}% ok, input ${f.inputRatio.toFixed(2)}x, output ${f.outputRatio.toFixed(2)}x`,
      );
    }
    if (s.totalExecutions < MIN_EXECUTIONS) {
      lines.push(`Estimates are not adjusted until ${MIN_EXECUTIONS} executions are recorded`);
    }
    return lines;
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    this.entries.length = 0;
    this.cached = undefined;
  }
}

function parseLine(line: string): ExecutionRecord | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = ExecutionRecordSchema.safeParse(data);
  return parsed.success ? parsed.data : undefined;
}
