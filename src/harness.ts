import { join, resolve } from "node:path";
import type { Budgets, Plan, Report } from "../contracts/types.js";
import { createDefaultRegistry } from "../candidates/index.js";
import type { CandidateRegistry } from "./catalog/registry.js";
import { FileCache, type ResponseCache } from "./cache/store.js";
import type { DocsmithConfig } from "./config.js";
import { PlanInputError, errorMessage } from "./errors.js";
import { createClaudeCliGenerator } from "./generator/claude-cli.js";
import type { Generator } from "./generator/types.js";
import { createSecretGuard } from "./guard/secret-guard.js";
import { HISTORY_FILE, type HistoryRecorder } from "./history/history.js";
import { plan, type EstimateAdjuster } from "./planner/planner.js";
import type { Reporter } from "./reporter/types.js";
import { createDirectorySource } from "./runner/context.js";
import type { Sleep } from "./runner/retry.js";
import { runPlan } from "./runner/runner.js";
import { readJsonIfExists } from "./util/fs.js";

async function readInput(path: string, label: string): Promise<unknown> {
  let data: unknown;
  try {
    data = await readJsonIfExists(path);
  } catch (err) {
    throw new PlanInputError(`Cannot read ${label} ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (data === undefined) throw new PlanInputError(`${label} not found: ${path}`);
  return data;
}

export function historyPath(config: DocsmithConfig): string {
  return config.historyFile ?? join(config.cacheDir, HISTORY_FILE);
}

export interface PlanFilesOptions {
  indexPath: string;
  signalsPath: string;
  budgets: Budgets;
  families?: string[];
  config: DocsmithConfig;
  registry?: CandidateRegistry;
  /** Calibrates estimates from past runs */
  history?: EstimateAdjuster;
}

/** Read the repo index and signals JSON documents and plan against them */
export async function planFromFiles(opts: PlanFilesOptions): Promise<Plan> {
  const [index, signals] = await Promise.all([
    readInput(opts.indexPath, "Repo index"),
    readInput(opts.signalsPath, "Repo signals"),
  ]);
  const registry = opts.registry ?? createDefaultRegistry();
  return plan({
    candidates: registry.list(),
    index,
    signals,
    budgets: opts.budgets,
    families: opts.families,
    config: opts.config.planner,
    estimator: opts.history,
  });
}

export interface HarnessOptions {
  plan: Plan;
  /** Checkout the plan's context refs are read from */
  repoRoot: string;
  outputDir: string;
  config: DocsmithConfig;
  reporter: Reporter;
  /** Override the generation backend (for testing) */
  generator?: Generator;
  /** Override the response cache (for testing) */
  cache?: ResponseCache;
  registry?: CandidateRegistry;
  /** Records every generation call */
  history?: HistoryRecorder;
  signal?: AbortSignal;
  runId?: string;
  sleep?: Sleep;
}

/** Wire cache, guard, generator and reporters around one run of a plan */
export async function runHarness(opts: HarnessOptions): Promise<Report> {
  const repoRoot = resolve(opts.repoRoot);
  const cache = opts.cache ?? (await FileCache.open(opts.config.cacheDir));
  const generator = opts.generator ?? createClaudeCliGenerator();

  const report = await runPlan(opts.plan, {
    outputDir: resolve(opts.outputDir),
    cache,
    generator,
    registry: opts.registry ?? createDefaultRegistry(),
    source: createDirectorySource(repoRoot),
    config: opts.config.runner,
    guard: createSecretGuard(opts.config.guard),
    progress: (t) => opts.reporter.jobTransition(t),
    onJobResult: (r) => opts.reporter.jobComplete(r),
    onObserverError: (err) => process.stderr.write(`warning: ${errorMessage(err)}\n`),
    history: opts.history,
    signal: opts.signal,
    runId: opts.runId,
    sleep: opts.sleep,
  });

  opts.reporter.runComplete(report);
  return report;
}
