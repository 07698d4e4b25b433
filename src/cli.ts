#!/usr/bin/env node

import { defineCommand, runMain } from "citty";
import { join } from "node:path";
import { createDefaultRegistry } from "../candidates/index.js";
import { loadPluginsFromDirectory } from "./catalog/plugins.js";
import type { CandidateRegistry } from "./catalog/registry.js";
import { loadConfig, type DocsmithConfig } from "./config.js";
import { DocsmithError, PlanInputError } from "./errors.js";
import { historyPath, planFromFiles, runHarness } from "./harness.js";
import { ExecutionHistory } from "./history/history.js";
import { loadPlan, savePlan } from "./planner/persist.js";
import { createConsoleReporter } from "./reporter/console.js";
import { createJsonReporter } from "./reporter/json.js";
import { combineReporters, type Reporter } from "./reporter/types.js";
import { REPORT_FILE, loadReport } from "./runner/report.js";
import { validateDirectory } from "./util/preflight.js";

/** Expected failures exit 2 with a one-line message; anything else is a bug and propagates */
async function guarded(fn: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await fn();
  } catch (err) {
    if (!(err instanceof DocsmithError)) throw err;
    process.stderr.write(`error [${err.code}]: ${err.message}\n`);
    process.exitCode = 2;
  }
}

function parseCount(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new PlanInputError(`--${flag} must be a non-negative integer (got "${value}")`);
  }
  return n;
}

async function buildRegistry(pluginDir: string | undefined): Promise<CandidateRegistry> {
  const registry = createDefaultRegistry();
  if (pluginDir) await loadPluginsFromDirectory(pluginDir, registry);
  return registry;
}

async function openHistory(config: DocsmithConfig): Promise<ExecutionHistory> {
  const history = await ExecutionHistory.load(historyPath(config));
  if (history.skippedLines > 0) {
    process.stderr.write(`warning: ignored ${history.skippedLines} unreadable line(s) in ${history.path}\n`);
  }
  return history;
}

const pluginsArg = { type: "string", description: "Directory of plugin modules (.js/.mjs)" } as const;

const catalog = defineCommand({
  meta: { name: "catalog", description: "List the artifact candidates" },
  args: {
    plugins: pluginsArg,
  },
  async run({ args }) {
    await guarded(async () => {
      for (const c of (await buildRegistry(args.plugins)).list()) {
        process.stdout.write(`${c.name}\t${c.family}\t${c.description}\n`);
      }
      return 0;
    });
  },
});

const planCmd = defineCommand({
  meta: { name: "plan", description: "Select artifacts to generate under token and time budgets" },
  args: {
    index: { type: "string", required: true, description: "Repo index JSON" },
    signals: { type: "string", required: true, description: "Repo signals JSON" },
    out: { type: "string", required: true, description: "Where to write the plan" },
    families: { type: "string", description: "Comma-separated artifact families (default: all)" },
    tokens: { type: "string", default: "200000", description: "Token budget" },
    seconds: { type: "string", default: "1800", description: "Time budget in seconds" },
    config: { type: "string", description: `Config file (default: ./docsmith.config.json if present)` },
    plugins: pluginsArg,
  },
  async run({ args }) {
    await guarded(async () => {
      const config = await loadConfig(args.config);
      const plan = await planFromFiles({
        indexPath: args.index,
        signalsPath: args.signals,
        budgets: { tokens: parseCount(args.tokens, "tokens"), seconds: parseCount(args.seconds, "seconds") },
        families: args.families?.split(",").map((f) => f.trim()).filter((f) => f.length > 0),
        config,
        registry: await buildRegistry(args.plugins),
        history: await openHistory(config),
      });
      await savePlan(args.out, plan);

      process.stdout.write(`Plan ${plan.planId} for ${plan.repoName}\n`);
      for (const job of plan.jobs) {
        process.stdout.write(
          `  ${job.candidate}\tscore ${job.score.totalScore.toFixed(1)}\t~${job.estimatedTokens} tokens\t~${job.estimatedSeconds}s\n`,
        );
      }
      process.stdout.write(
        `Selected ${plan.jobs.length}, excluded ${plan.excluded.length}; total ~${plan.totals.tokens}/${plan.budgets.tokens} tokens, ~${plan.totals.seconds}/${plan.budgets.seconds}s\n`,
      );
      return 0;
    });
  },
});

const run = defineCommand({
  meta: { name: "run", description: "Generate the artifacts of a plan" },
  args: {
    plan: { type: "string", required: true, description: "Plan file from `docsmith plan`" },
    repo: { type: "string", required: true, description: "Repository checkout to read context from" },
    out: { type: "string", required: true, description: "Output directory (report and artifacts)" },
    config: { type: "string", description: "Config file" },
    "reporter-json": { type: "string", description: "Also append JSONL events to this file" },
    "run-id": { type: "string", description: "Correlation ID (auto-generated if omitted)" },
    plugins: pluginsArg,
  },
  async run({ args }) {
    await guarded(async () => {
      const config = await loadConfig(args.config);
      const plan = await loadPlan(args.plan);
      await validateDirectory(args.repo, "Repository");

      const reporters: Reporter[] = [createConsoleReporter(process.env)];
      if (args["reporter-json"]) reporters.push(createJsonReporter(args["reporter-json"], process.env));

      const controller = new AbortController();
      process.once("SIGINT", () => {
        process.stderr.write("\nStopping after in-flight jobs finish...\n");
        controller.abort();
      });

      const report = await runHarness({
        plan,
        repoRoot: args.repo,
        outputDir: args.out,
        config,
        reporter: combineReporters(...reporters),
        registry: await buildRegistry(args.plugins),
        history: await openHistory(config),
        signal: controller.signal,
        runId: args["run-id"],
      });
      return report.counts.failed > 0 ? 1 : 0;
    });
  },
});

const report = defineCommand({
  meta: { name: "report", description: "Show the report of the last run in an output directory" },
  args: {
    out: { type: "string", required: true, description: "Output directory" },
  },
  async run({ args }) {
    await guarded(async () => {
      const path = join(args.out, REPORT_FILE);
      const r = await loadReport(path);
      if (!r) {
        process.stderr.write(`No report at ${path}\n`);
        return 2;
      }
      process.stdout.write(`Run ${r.runId} (plan ${r.planId})${r.cancelled ? " [cancelled]" : ""}\n`);
      for (const res of r.results) {
        const detail = res.skipReason ?? res.error ?? res.artifactPath ?? "";
        process.stdout.write(`  ${res.outcome}\t${res.candidate}\t${detail}\n`);
      }
      process.stdout.write(
        `${r.counts.completed} completed, ${r.counts.skipped} skipped, ${r.counts.failed} failed of ${r.totalJobs}; ${r.usage.inputTokens}in / ${r.usage.outputTokens}out\n`,
      );
      return r.counts.failed > 0 ? 1 : 0;
    });
  },
});

const historyCmd = defineCommand({
  meta: { name: "history", description: "Show how past estimates compared with actual usage" },
  args: {
    config: { type: "string", description: "Config file" },
    clear: { type: "boolean", default: false, description: "Delete the recorded history" },
  },
  async run({ args }) {
    await guarded(async () => {
      const h = await openHistory(await loadConfig(args.config));
      if (args.clear) {
        await h.clear();
        process.stdout.write(`Cleared ${h.path}\n`);
        return 0;
      }
      for (const line of h.summary()) process.stdout.write(`${line}\n`);
      return 0;
    });
  },
});

const main = defineCommand({
  meta: {
    name: "docsmith",
    version: "0.1.0",
    description: "Budgeted, cached documentation generation for a repository snapshot",
  },
  subCommands: { catalog, plan: planCmd, run, report, history: historyCmd },
});

void runMain(main);
