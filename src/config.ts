import { z } from "zod";
import { resolve } from "node:path";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_GUARD_CONFIG, createSecretGuard, type GuardConfig } from "./guard/secret-guard.js";
import { DEFAULT_PLANNER_CONFIG, type PlannerConfig } from "./planner/planner.js";
import { DEFAULT_RUNNER_CONFIG, type RunnerConfig } from "./runner/runner.js";
import { ScoreWeightsSchema, describeIssues } from "./schemas.js";
import { readJsonIfExists } from "./util/fs.js";

export const CONFIG_FILE = "docsmith.config.json";

export interface DocsmithConfig {
  guard: GuardConfig;
  planner: PlannerConfig;
  runner: RunnerConfig;
  /** Response cache shared by every run */
  cacheDir: string;
  /** Execution history log; `<cacheDir>/history.jsonl` when omitted */
  historyFile?: string;
}

export const DEFAULT_CONFIG: DocsmithConfig = {
  guard: DEFAULT_GUARD_CONFIG,
  planner: DEFAULT_PLANNER_CONFIG,
  runner: DEFAULT_RUNNER_CONFIG,
  cacheDir: ".docsmith-cache",
};

const positiveInt = z.number().int().positive();
const unit = z.number().min(0).max(1);

const ConfigFileSchema = z
  .object({
    guard: z
      .object({
        minConfidence: unit,
        entropyThreshold: z.number().positive(),
        entropyMinLength: positiveInt,
        entropyConfidence: unit,
        extraPatterns: z.array(
          z.object({
            name: z.string().min(1),
            regex: z.string().min(1),
            flags: z.string().optional(),
            severity: z.enum(["critical", "high", "medium", "low", "informational"]),
            confidence: unit,
          }),
        ),
      })
      .strict()
      .partial(),
    planner: z
      .object({
        weights: ScoreWeightsSchema.partial(),
        minScore: z.number(),
        maxContextRefs: positiveInt,
        maxExcerptBytes: positiveInt,
        maxContextTokens: positiveInt,
        overheadTokens: z.number().int().nonnegative(),
      })
      .strict()
      .partial(),
    runner: z
      .object({
        model: z.string().min(1),
        temperature: z.number().min(0).max(2),
        concurrency: positiveInt,
        retry: z
          .object({
            maxAttempts: positiveInt,
            baseDelayMs: z.number().int().nonnegative(),
            multiplier: z.number().min(1),
            maxDelayMs: z.number().int().nonnegative(),
            timeoutMs: positiveInt,
          })
          .strict()
          .partial(),
        maxExcerptBytes: positiveInt,
        maxTotalContextBytes: positiveInt,
      })
      .strict()
      .partial(),
    cacheDir: z.string().min(1),
    historyFile: z.string().min(1),
  })
  .strict()
  .partial();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Overlay a validated config file on the defaults */
export function mergeConfig(base: DocsmithConfig, file: ConfigFile): DocsmithConfig {
  return {
    guard: { ...base.guard, ...file.guard },
    planner: {
      ...base.planner,
      ...file.planner,
      weights: { ...base.planner.weights, ...file.planner?.weights },
    },
    runner: {
      ...base.runner,
      ...file.runner,
      retry: { ...base.runner.retry, ...file.runner?.retry },
    },
    cacheDir: file.cacheDir ?? base.cacheDir,
    historyFile: file.historyFile ?? base.historyFile,
  };
}

/** DOCSMITH_MODEL and DOCSMITH_CONCURRENCY win over the file */
export function applyEnv(config: DocsmithConfig, env: Record<string, string | undefined>): DocsmithConfig {
  const runner = { ...config.runner };
  const model = env["DOCSMITH_MODEL"]?.trim();
  if (model) runner.model = model;

  const concurrency = env["DOCSMITH_CONCURRENCY"]?.trim();
  if (concurrency) {
    const n = Number(concurrency);
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigError(`DOCSMITH_CONCURRENCY must be a positive integer (got "${concurrency}")`);
    }
    runner.concurrency = n;
  }
  return { ...config, runner };
}

/**
 * Defaults, then the config file, then environment overrides. Without an
 * explicit path, `docsmith.config.json` in cwd is used when present.
 */
export async function loadConfig(
  path?: string,
  env: Record<string, string | undefined> = process.env,
): Promise<DocsmithConfig> {
  const target = resolve(path ?? CONFIG_FILE);
  let data: unknown;
  try {
    data = await readJsonIfExists(target);
  } catch (err) {
    throw new ConfigError(`Cannot read config ${target}: ${errorMessage(err)}`, { cause: err });
  }
  if (data === undefined && path !== undefined) {
    throw new ConfigError(`Config file not found: ${target}`);
  }

  let config = DEFAULT_CONFIG;
  if (data !== undefined) {
    const parsed = ConfigFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(`Invalid config ${target}: ${describeIssues(parsed.error)}`);
    }
    config = mergeConfig(config, parsed.data);
  }
  config = applyEnv(config, env);

  // Surfaces bad extra patterns now rather than mid-run
  createSecretGuard(config.guard);
  return config;
}
