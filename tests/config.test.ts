import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_FILE, DEFAULT_CONFIG, applyEnv, loadConfig, mergeConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "docsmith-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeConfig(data: unknown): Promise<string> {
  const path = join(dir, CONFIG_FILE);
  await writeFile(path, JSON.stringify(data));
  return path;
}

describe("mergeConfig", () => {
  test("overlays nested weights and retry without dropping defaults", () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {
      planner: { weights: { gapWeight: 3 } },
      runner: { retry: { maxAttempts: 5 }, concurrency: 4 },
    });
    expect(merged.planner.weights).toEqual({ ...DEFAULT_CONFIG.planner.weights, gapWeight: 3 });
    expect(merged.planner.minScore).toBe(10);
    expect(merged.runner.retry).toEqual({ ...DEFAULT_CONFIG.runner.retry, maxAttempts: 5 });
    expect(merged.runner.concurrency).toBe(4);
    expect(merged.runner.model).toBe(DEFAULT_CONFIG.runner.model);
    expect(merged.cacheDir).toBe(".docsmith-cache");
  });
});

describe("applyEnv", () => {
  test("model and concurrency override the config", () => {
    const config = applyEnv(DEFAULT_CONFIG, { DOCSMITH_MODEL: " claude-test ", DOCSMITH_CONCURRENCY: "3" });
    expect(config.runner.model).toBe("claude-test");
    expect(config.runner.concurrency).toBe(3);
  });

  test("empty values are ignored", () => {
    const config = applyEnv(DEFAULT_CONFIG, { DOCSMITH_MODEL: "", DOCSMITH_CONCURRENCY: " " });
    expect(config.runner).toEqual(DEFAULT_CONFIG.runner);
  });

  test.each(["0", "-1", "1.5", "many"])("rejects DOCSMITH_CONCURRENCY=%s", (value) => {
    expect(() => applyEnv(DEFAULT_CONFIG, { DOCSMITH_CONCURRENCY: value })).toThrow(
      `DOCSMITH_CONCURRENCY must be a positive integer (got "${value}")`,
    );
  });
});

describe("loadConfig", () => {
  test("defaults when no file is present", async () => {
    const previousCwd = process.cwd();
    process.chdir(dir);
    try {
      expect(await loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
    } finally {
      process.chdir(previousCwd);
    }
  });

  test("reads the file and applies env last", async () => {
    const path = await writeConfig({
      runner: { model: "from-file", concurrency: 2 },
      cacheDir: "/tmp/shared-cache",
    });
    const config = await loadConfig(path, { DOCSMITH_MODEL: "from-env" });
    expect(config.runner.model).toBe("from-env");
    expect(config.runner.concurrency).toBe(2);
    expect(config.cacheDir).toBe("/tmp/shared-cache");
  });

  test("historyFile is optional and read from the file", async () => {
    expect(DEFAULT_CONFIG.historyFile).toBeUndefined();
    const path = await writeConfig({ historyFile: "/tmp/docsmith-history.jsonl" });
    expect((await loadConfig(path, {})).historyFile).toBe("/tmp/docsmith-history.jsonl");
  });

  test("an explicit missing path is an error", async () => {
    await expect(loadConfig(join(dir, "nope.json"), {})).rejects.toThrow(/Config file not found/);
  });

  test("malformed JSON is a config error", async () => {
    const path = join(dir, CONFIG_FILE);
    await writeFile(path, "{ not json");
    await expect(loadConfig(path, {})).rejects.toThrow(ConfigError);
  });

  test("unknown keys are rejected", async () => {
    const path = await writeConfig({ runner: { modle: "typo" } });
    await expect(loadConfig(path, {})).rejects.toThrow(/Invalid config/);
  });

  test("out-of-range values are rejected", async () => {
    const path = await writeConfig({ guard: { minConfidence: 2 } });
    await expect(loadConfig(path, {})).rejects.toThrow(ConfigError);
  });

  test("invalid extra patterns fail at load", async () => {
    const path = await writeConfig({
      guard: { extraPatterns: [{ name: "bad", regex: "[", severity: "high", confidence: 0.9 }] },
    });
    await expect(loadConfig(path, {})).rejects.toThrow(ConfigError);
  });
});
