import { setTimeout as delay } from "node:timers/promises";
import type { TokenUsage } from "../../contracts/types.js";
import { GenerationError, errorMessage } from "../errors.js";
import type { GenerationRequest, GenerationResponse, Generator } from "../generator/types.js";

export interface RetryPolicy {
  /** Total calls allowed per job, first attempt included */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Per-call limit; expiry counts as a retryable failure */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30_000,
  timeoutMs: 300_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => delay(ms);

/** Wait before attempt `failedAttempt + 1`: base * multiplier^(n-1), capped */
export function backoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  const raw = policy.baseDelayMs * policy.multiplier ** (failedAttempt - 1);
  return Math.min(policy.maxDelayMs, raw);
}

export type AttemptOutcome =
  | { kind: "success"; response: GenerationResponse }
  | { kind: "retryable"; error: string; response?: GenerationResponse }
  | { kind: "terminal"; error: string };

function classifyResponse(response: GenerationResponse): AttemptOutcome {
  if (response.error !== undefined && response.error !== "") {
    return { kind: "retryable", error: response.error, response };
  }
  return { kind: "success", response };
}

function classifyError(err: unknown): AttemptOutcome {
  if (err instanceof GenerationError && !err.retryable) {
    return { kind: "terminal", error: err.message };
  }
  return { kind: "retryable", error: errorMessage(err) };
}

/** One call, bounded by timeoutMs. Never rejects. */
export async function attemptOnce(
  generator: Generator,
  request: Omit<GenerationRequest, "signal">,
  timeoutMs: number,
): Promise<AttemptOutcome> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<AttemptOutcome>((res) => {
    timer = setTimeout(() => {
      controller.abort();
      res({ kind: "retryable", error: `Generation timed out after ${timeoutMs}ms` });
    }, timeoutMs);
  });
  const call = generator
    .generate({ ...request, signal: controller.signal })
    .then(classifyResponse, classifyError);
  try {
    return await Promise.race([call, timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryHooks {
  sleep: Sleep;
  /** Fired before each call, 1-based */
  onAttempt?: (attempt: number, usage: TokenUsage) => void;
  /** Fired after each call with the usage it reported */
  onUsage?: (usage: TokenUsage) => void;
}

export type RetryResult =
  | { status: "completed"; response: GenerationResponse; attempts: number; usage: TokenUsage }
  | { status: "failed"; error: string; attempts: number; usage: TokenUsage };

/**
 * Retry loop for one job: calling → calling on a retryable failure,
 * calling → completed on success, calling → failed on a terminal failure
 * or once maxAttempts calls have been made.
 */
export async function generateWithRetry(
  generator: Generator,
  request: Omit<GenerationRequest, "signal">,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<RetryResult> {
  const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let lastError = "No attempt made";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    hooks.onAttempt?.(attempt, usage);
    const outcome = await attemptOnce(generator, request, policy.timeoutMs);

    const response = outcome.kind === "terminal" ? undefined : outcome.response;
    if (response) {
      const callUsage = { inputTokens: response.inputTokens, outputTokens: response.outputTokens };
      usage.inputTokens += callUsage.inputTokens;
      usage.outputTokens += callUsage.outputTokens;
      hooks.onUsage?.(callUsage);
    }

    switch (outcome.kind) {
      case "success":
        return { status: "completed", response: outcome.response, attempts: attempt, usage };
      case "terminal":
        return { status: "failed", error: outcome.error, attempts: attempt, usage };
      case "retryable":
        lastError = outcome.error;
        if (attempt < maxAttempts) await hooks.sleep(backoffDelay(policy, attempt));
    }
  }

  return {
    status: "failed",
    error: `Gave up after ${maxAttempts} attempts: ${lastError}`,
    attempts: maxAttempts,
    usage,
  };
}
