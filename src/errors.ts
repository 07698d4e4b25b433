export type ErrorCode =
  | "plan_input"
  | "config_invalid"
  | "cache_unavailable"
  | "cache_corrupted"
  | "generation_failed";

/** Base class for every error docsmith raises on purpose */
export class DocsmithError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed or missing index, signals, catalog or budgets. Nothing partial is produced. */
export class PlanInputError extends DocsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("plan_input", message, options);
  }
}

export class ConfigError extends DocsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_invalid", message, options);
  }
}

/** Cache directory missing, unwritable or unreadable. Fatal for a run. */
export class CacheUnavailableError extends DocsmithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("cache_unavailable", message, options);
  }
}

/** A stored entry failed to parse or does not match its key. Fatal for a run. */
export class CacheCorruptedError extends DocsmithError {
  readonly fingerprint: string;

  constructor(fingerprint: string, message: string, options?: { cause?: unknown }) {
    super("cache_corrupted", message, options);
    this.fingerprint = fingerprint;
  }
}

/**
 * Failure reported by a generation backend.
 * `retryable: false` ends the job at once; anything else is retried.
 */
export class GenerationError extends DocsmithError {
  readonly retryable: boolean;

  constructor(message: string, opts: { retryable: boolean; cause?: unknown }) {
    super("generation_failed", message, { cause: opts.cause });
    this.retryable = opts.retryable;
  }
}

export function isCacheError(err: unknown): err is CacheUnavailableError | CacheCorruptedError {
  return err instanceof CacheUnavailableError || err instanceof CacheCorruptedError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
