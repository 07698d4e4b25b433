import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { JobResult, JobTransition, Report } from "../contracts/types.js";
import { createDefaultRegistry } from "../candidates/index.js";
import { DEFAULT_CONFIG, type DocsmithConfig } from "../src/config.js";
import { PlanInputError } from "../src/errors.js";
import type { Generator } from "../src/generator/types.js";
import { historyPath, planFromFiles, runHarness } from "../src/harness.js";
import { ExecutionHistory } from "../src/history/history.js";
import type { Reporter } from "../src/reporter/types.js";

interface RecordingReporter extends Reporter {
  transitions: JobTransition[];
  results: JobResult[];
  reports: Report[];
}

function recordingReporter(): RecordingReporter {
  const transitions: JobTransition[] = [];
  const results: JobResult[] = [];
  const reports: Report[] = [];
  return {
    transitions,
    results,
    reports,
    jobTransition: (t) => transitions.push(t),
    jobComplete: (r) => results.push(r),
    runComplete: (r) => reports.push(r),
  };
}

const generator: Generator = {
  name: "fake",
  async generate(req) {
    return { text: `# ${req.userPrompt.split("\n")[0] ?? ""}`, inputTokens: 10, outputTokens: 5 };
  },
};

let dir: string;
let repo: string;
let config: DocsmithConfig;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "docsmith-harness-"));
  repo = join(dir, "repo");
  await mkdir(repo);
  await writeFile(join(repo, "README.md"), "# Demo\n");
  await writeFile(join(repo, "package.json"), '{"name":"demo"}\n');
  await writeFile(
    join(dir, "index.json"),
    JSON.stringify({
      repoName: "demo",
      files: [
        { path: "README.md", sizeBytes: 7, sha256: "a".repeat(64), isBinary: false },
        { path: "package.json", sizeBytes: 16, sha256: "b".repeat(64), isBinary: false },
      ],
    }),
  );
  await writeFile(join(dir, "signals.json"), JSON.stringify({ identifiedGaps: ["README is minimal"] }));
  config = { ...DEFAULT_CONFIG, cacheDir: join(dir, "cache") };
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function docsPlan() {
  return planFromFiles({
    indexPath: join(dir, "index.json"),
    signalsPath: join(dir, "signals.json"),
    budgets: { tokens: 1_000_000, seconds: 100_000 },
    families: ["docs"],
    config,
  });
}

describe("planFromFiles", () => {
  test("plans the requested families from the input documents", async () => {
    const p = await docsPlan();
    expect(p.jobs.length).toBeGreaterThan(0);
    expect(p.jobs.every((j) => j.family === "docs")).toBe(true);
    expect(p.jobs.every((j) => j.contextRefs.some((r) => r.path === "README.md"))).toBe(true);
  });

  test("is deterministic", async () => {
    expect(await docsPlan()).toEqual(await docsPlan());
  });

  test("a missing input file is a plan input error", async () => {
    const err = await planFromFiles({
      indexPath: join(dir, "missing.json"),
      signalsPath: join(dir, "signals.json"),
      budgets: { tokens: 1000, seconds: 1000 },
      config,
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PlanInputError);
    expect(err).toHaveProperty("message", `Repo index not found: ${join(dir, "missing.json")}`);
  });

  test("malformed JSON is a plan input error", async () => {
    await writeFile(join(dir, "signals.json"), "{");
    await expect(docsPlan()).rejects.toThrow(/Cannot read Repo signals/);
  });
});

describe("runHarness", () => {
  test("runs the plan and reports every event", async () => {
    const p = await docsPlan();
    const reporter = recordingReporter();
    const report = await runHarness({
      plan: p,
      repoRoot: repo,
      outputDir: join(dir, "out"),
      config,
      reporter,
      generator,
      runId: "feedbeef",
    });

    expect(report.runId).toBe("feedbeef");
    expect(report.counts.completed).toBe(p.jobs.length);
    expect(reporter.results.map((r) => r.candidate)).toEqual(p.jobs.map((j) => j.candidate));
    expect(reporter.reports).toEqual([report]);
    expect(reporter.transitions.filter((t) => t.to === "completed")).toHaveLength(p.jobs.length);

    const first = p.jobs[0]!;
    const artifact = await readFile(join(dir, "out", "artifacts", first.outputPath), "utf8");
    expect(artifact.startsWith("# ")).toBe(true);
  });

  test("a second run is served from the configured cache", async () => {
    const p = await docsPlan();
    await runHarness({ plan: p, repoRoot: repo, outputDir: join(dir, "out1"), config, reporter: recordingReporter(), generator });
    const second = await runHarness({
      plan: p,
      repoRoot: repo,
      outputDir: join(dir, "out2"),
      config,
      reporter: recordingReporter(),
      generator: {
        name: "unreachable",
        generate: async () => {
          throw new Error("generator should not be called");
        },
      },
    });
    expect(second.counts).toEqual({ completed: 0, skipped: p.jobs.length, failed: 0 });
  });

  test("records every generated job in the execution history", async () => {
    const p = await docsPlan();
    const history = await ExecutionHistory.load(historyPath(config));
    await runHarness({ plan: p, repoRoot: repo, outputDir: join(dir, "out"), config, reporter: recordingReporter(), generator, history });

    const reloaded = await ExecutionHistory.load(join(dir, "cache", "history.jsonl"));
    expect(reloaded.records.map((r) => r.candidate)).toEqual(p.jobs.map((j) => j.candidate));
    expect(reloaded.records.every((r) => r.success && r.actualInputTokens === 10 && r.actualOutputTokens === 5)).toBe(
      true,
    );
  });

  test("registered post-processors shape the written artifacts", async () => {
    const registry = createDefaultRegistry().registerPostProcessor({
      name: "footer",
      process: (text) => `${text}\n<!-- generated -->\n`,
    });
    const p = await docsPlan();
    await runHarness({ plan: p, repoRoot: repo, outputDir: join(dir, "out"), config, reporter: recordingReporter(), generator, registry });

    const artifact = await readFile(join(dir, "out", "artifacts", p.jobs[0]!.outputPath), "utf8");
    expect(artifact.endsWith("\n<!-- generated -->\n")).toBe(true);
  });

  test("a reporter that throws is reported as a warning and the run completes", async () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    try {
      const p = await docsPlan();
      const reporter = recordingReporter();
      reporter.jobTransition = () => {
        throw new Error("reporter down");
      };
      const report = await runHarness({ plan: p, repoRoot: repo, outputDir: join(dir, "out"), config, reporter, generator });
      expect(report.counts.completed).toBe(p.jobs.length);
      expect(stderr).toHaveBeenCalledWith("warning: reporter down\n");
    } finally {
      stderr.mockRestore();
    }
  });
});

describe("historyPath", () => {
  test("defaults to the cache directory", () => {
    expect(historyPath(config)).toBe(join(dir, "cache", "history.jsonl"));
  });

  test("an explicit file wins", () => {
    expect(historyPath({ ...config, historyFile: "/var/docsmith/history.jsonl" })).toBe("/var/docsmith/history.jsonl");
  });
});
