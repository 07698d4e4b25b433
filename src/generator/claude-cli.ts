import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { ExecOptions, ExecResult } from "../../contracts/types.js";
import { GenerationError } from "../errors.js";
import { execFilePromise } from "../util/exec.js";
import type { GenerationRequest, GenerationResponse, Generator } from "./types.js";

const DEFAULT_TIMEOUT = 600_000;
/** --output-format json wraps the whole response, so allow large output */
const CLAUDE_MAX_OUTPUT = 10 * 1024 * 1024;

/** Generation is text in, text out; the model gets no tools at all */
export const DISALLOWED_TOOLS = [
  "Bash",
  "Read",
  "Edit",
  "Write",
  "MultiEdit",
  "Glob",
  "Grep",
  "LS",
  "NotebookEdit",
  "WebFetch",
  "WebSearch",
  "Task",
  "TodoWrite",
] as const;

const ClaudeJsonOutput = z.object({
  result: z.string().optional(),
  is_error: z.boolean().optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export interface ClaudeCliOptions {
  /** Executable name or path */
  command?: string;
  /** Working directory of the CLI; a fresh empty directory per call when omitted */
  cwd?: string;
  timeout?: number;
  /** Swap the process runner (tests) */
  exec?: (opts: ExecOptions) => Promise<ExecResult>;
}

export function parseClaudeOutput(stdout: string): GenerationResponse {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (err) {
    return { text: "", inputTokens: 0, outputTokens: 0, error: `Unparseable CLI output: ${String(err)}` };
  }
  const parsed = ClaudeJsonOutput.safeParse(data);
  if (!parsed.success || parsed.data.result === undefined) {
    return { text: "", inputTokens: 0, outputTokens: 0, error: "CLI output has no result field" };
  }
  const usage = {
    inputTokens: parsed.data.usage?.input_tokens ?? 0,
    outputTokens: parsed.data.usage?.output_tokens ?? 0,
  };
  if (parsed.data.is_error) {
    return { text: "", ...usage, error: parsed.data.result };
  }
  return { text: parsed.data.result, ...usage };
}

/**
 * Generator backed by the `claude` CLI in print mode. Everything the model
 * may see is already in the prompt: tools are disallowed and the process
 * runs outside the repository.
 */
export function createClaudeCliGenerator(opts: ClaudeCliOptions = {}): Generator {
  const exec = opts.exec ?? execFilePromise;
  const command = opts.command ?? "claude";

  return {
    name: "claude-cli",

    async generate(request: GenerationRequest): Promise<GenerationResponse> {
      const argv = [
        command,
        "-p",
        "--output-format",
        "json",
        "--model",
        request.model,
        "--disallowedTools",
        DISALLOWED_TOOLS.join(","),
        "--system-prompt",
        request.systemPrompt,
        request.userPrompt,
      ];

      // The CLI has no temperature flag; maxTokens goes through its env cap
      const run = (cwd: string): Promise<ExecResult> =>
        exec({
          argv,
          cwd,
          timeout: opts.timeout ?? DEFAULT_TIMEOUT,
          env: { CLAUDE_CODE_MAX_OUTPUT_TOKENS: String(request.maxTokens) },
          maxOutput: CLAUDE_MAX_OUTPUT,
          signal: request.signal,
        });

      let result: ExecResult;
      if (opts.cwd !== undefined) {
        result = await run(opts.cwd);
      } else {
        const scratch = await mkdtemp(join(tmpdir(), "docsmith-claude-"));
        try {
          result = await run(scratch);
        } finally {
          await rm(scratch, { recursive: true, force: true });
        }
      }

      if (result.timedOut || request.signal?.aborted) {
        return { text: "", inputTokens: 0, outputTokens: 0, error: "Generation timed out" };
      }
      if (result.exitCode === 127 || /ENOENT/.test(result.stderr)) {
        throw new GenerationError(`${command} CLI not found`, { retryable: false });
      }
      if (result.exitCode !== 0) {
        return {
          text: "",
          inputTokens: 0,
          outputTokens: 0,
          error: result.stderr.trim() || `Exit code ${result.exitCode}`,
        };
      }
      return parseClaudeOutput(result.stdout);
    },
  };
}
