import { execFile } from "node:child_process";
import type { ExecOptions, ExecResult } from "../../contracts/types.js";
import { MAX_OUTPUT_BYTES, truncate } from "./sanitize.js";

/** Run an argv command without a shell; never rejects, failures land in the result */
export function execFilePromise(opts: ExecOptions): Promise<ExecResult> {
  const [cmd, ...args] = opts.argv;
  if (!cmd) throw new Error("Empty argv");
  const maxOutput = opts.maxOutput ?? MAX_OUTPUT_BYTES;

  return new Promise((res) => {
    const start = performance.now();
    const child = execFile(
      cmd,
      args,
      {
        cwd: opts.cwd,
        timeout: opts.timeout,
        env: opts.env ? { ...process.env, ...opts.env } : undefined,
        maxBuffer: maxOutput,
        signal: opts.signal,
        shell: false,
      },
      (err, stdout, stderr) => {
        const durationMs = Math.round(performance.now() - start);
        const timedOut = !!(err && "killed" in err && err.killed && !opts.signal?.aborted);
        const exitCode =
          err && "code" in err && typeof err.code === "number"
            ? err.code
            : err
              ? 1
              : 0;
        res({
          exitCode,
          stdout: truncate(stdout, maxOutput),
          // Spawn failures (ENOENT and the like) carry no stderr of their own
          stderr: truncate(stderr || (err && exitCode !== 0 ? err.message : ""), maxOutput),
          durationMs,
          timedOut,
        });
      },
    );
    // Non-interactive: without this, CLIs in print mode block waiting on stdin
    child.stdin?.end();
  });
}
