import { describe, test, expect } from "vitest";
import { readdir, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ExecOptions, ExecResult } from "../contracts/types.js";
import { GenerationError } from "../src/errors.js";
import { DISALLOWED_TOOLS, createClaudeCliGenerator, parseClaudeOutput } from "../src/generator/claude-cli.js";
import { execFilePromise } from "../src/util/exec.js";

function mockExec(result: Partial<ExecResult> = {}, seen: ExecOptions[] = []) {
  return async (opts: ExecOptions): Promise<ExecResult> => {
    seen.push(opts);
    return {
      exitCode: 0,
      stdout: JSON.stringify({ result: "# Guide", usage: { input_tokens: 120, output_tokens: 30 } }),
      stderr: "",
      durationMs: 10,
      timedOut: false,
      ...result,
    };
  };
}

const request = {
  systemPrompt: "You write docs.",
  userPrompt: "Write GUIDE.md",
  model: "claude-test",
  maxTokens: 4096,
  temperature: 0,
};

describe("createClaudeCliGenerator", () => {
  test("builds argv without a shell string", async () => {
    const seen: ExecOptions[] = [];
    const gen = createClaudeCliGenerator({ exec: mockExec({}, seen), cwd: "/work", timeout: 1000 });
    await gen.generate(request);
    expect(seen[0]?.argv).toEqual([
      "claude",
      "-p",
      "--output-format",
      "json",
      "--model",
      "claude-test",
      "--disallowedTools",
      "Bash,Read,Edit,Write,MultiEdit,Glob,Grep,LS,NotebookEdit,WebFetch,WebSearch,Task,TodoWrite",
      "--system-prompt",
      "You write docs.",
      "Write GUIDE.md",
    ]);
    expect(seen[0]?.cwd).toBe("/work");
    expect(seen[0]?.timeout).toBe(1000);
  });

  test("every tool that reads, writes, runs or fetches is disallowed", () => {
    for (const tool of ["Bash", "Read", "Write", "Edit", "Glob", "Grep", "WebFetch", "WebSearch"]) {
      expect(DISALLOWED_TOOLS).toContain(tool);
    }
  });

  test("runs in a fresh empty directory outside the repository and removes it", async () => {
    const seen: ExecOptions[] = [];
    const entries: string[][] = [];
    const exec = async (opts: ExecOptions): Promise<ExecResult> => {
      entries.push(await readdir(opts.cwd));
      return mockExec({}, seen)(opts);
    };
    const gen = createClaudeCliGenerator({ exec });
    await gen.generate(request);
    await gen.generate(request);

    const [first, second] = seen.map((o) => o.cwd);
    expect(first?.startsWith(join(tmpdir(), "docsmith-claude-"))).toBe(true);
    expect(second).not.toBe(first);
    expect(first).not.toBe(process.cwd());
    expect(entries).toEqual([[], []]);
    await expect(stat(first ?? "")).rejects.toThrow(/ENOENT/);
  });

  test("passes the output token cap through the environment", async () => {
    const seen: ExecOptions[] = [];
    await createClaudeCliGenerator({ exec: mockExec({}, seen) }).generate({ ...request, maxTokens: 2048 });
    expect(seen[0]?.env).toEqual({ CLAUDE_CODE_MAX_OUTPUT_TOKENS: "2048" });
  });

  test("uses a custom command", async () => {
    const seen: ExecOptions[] = [];
    await createClaudeCliGenerator({ command: "/opt/bin/claude", exec: mockExec({}, seen) }).generate(request);
    expect(seen[0]?.argv[0]).toBe("/opt/bin/claude");
  });

  test("returns text and usage", async () => {
    const response = await createClaudeCliGenerator({ exec: mockExec() }).generate(request);
    expect(response).toEqual({ text: "# Guide", inputTokens: 120, outputTokens: 30 });
  });

  test("non-zero exit is a retryable error response", async () => {
    const gen = createClaudeCliGenerator({ exec: mockExec({ exitCode: 1, stdout: "", stderr: "overloaded\n" }) });
    expect(await gen.generate(request)).toEqual({ text: "", inputTokens: 0, outputTokens: 0, error: "overloaded" });
  });

  test("non-zero exit without stderr reports the code", async () => {
    const gen = createClaudeCliGenerator({ exec: mockExec({ exitCode: 2, stdout: "" }) });
    expect((await gen.generate(request)).error).toBe("Exit code 2");
  });

  test("timeout is reported in the response", async () => {
    const gen = createClaudeCliGenerator({ exec: mockExec({ exitCode: 1, stdout: "", timedOut: true }) });
    expect((await gen.generate(request)).error).toBe("Generation timed out");
  });

  test("a missing executable is terminal", async () => {
    const gen = createClaudeCliGenerator({
      exec: mockExec({ exitCode: 1, stdout: "", stderr: "spawn claude ENOENT" }),
    });
    const err = await gen.generate(request).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationError);
    expect(err).toHaveProperty("retryable", false);
    expect(err).toHaveProperty("message", "claude CLI not found");
  });
});

describe("parseClaudeOutput", () => {
  test("missing usage counts as zero", () => {
    expect(parseClaudeOutput('{"result":"ok"}')).toEqual({ text: "ok", inputTokens: 0, outputTokens: 0 });
  });

  test("is_error carries the result as the error", () => {
    expect(parseClaudeOutput('{"result":"rate limited","is_error":true,"usage":{"input_tokens":5}}')).toEqual({
      text: "",
      inputTokens: 5,
      outputTokens: 0,
      error: "rate limited",
    });
  });

  test("missing result", () => {
    expect(parseClaudeOutput('{"usage":{}}').error).toBe("CLI output has no result field");
  });

  test("not JSON", () => {
    expect(parseClaudeOutput("Error: boom").error).toMatch(/^Unparseable CLI output: /);
  });
});

describe("execFilePromise", () => {
  const node = process.execPath;

  test("captures stdout and exit code", async () => {
    const result = await execFilePromise({
      argv: [node, "-e", "process.stdout.write('hello')"],
      cwd: tmpdir(),
      timeout: 10_000,
    });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("hello");
    expect(result.timedOut).toBe(false);
  });

  test("arguments are passed literally", async () => {
    const result = await execFilePromise({
      argv: [node, "-e", "process.stdout.write(process.argv[1])", "$(echo pwned); `id`"],
      cwd: tmpdir(),
      timeout: 10_000,
    });
    expect(result.stdout).toBe("$(echo pwned); `id`");
  });

  test("reports a non-zero exit", async () => {
    const result = await execFilePromise({
      argv: [node, "-e", "process.stderr.write('bad'); process.exit(3)"],
      cwd: tmpdir(),
      timeout: 10_000,
    });
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe("bad");
  });

  test("flags a timeout", async () => {
    const result = await execFilePromise({
      argv: [node, "-e", "setTimeout(() => {}, 10000)"],
      cwd: tmpdir(),
      timeout: 200,
    });
    expect(result.timedOut).toBe(true);
  });

  test("a missing executable lands in stderr", async () => {
    const result = await execFilePromise({ argv: ["docsmith-no-such-binary"], cwd: tmpdir(), timeout: 1000 });
    expect(result.exitCode).not.toBe(0);
    expect(result.stderr).toMatch(/ENOENT/);
  });
});
