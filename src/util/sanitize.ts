/** Env var names whose values are secrets (case-insensitive suffix match) */
export const SECRET_ENV_NAMES: RegExp[] = [
  /KEY$/i,
  /TOKEN$/i,
  /SECRET$/i,
  /PASSWORD$/i,
  /CREDENTIAL$/i,
];

/** Default output cap in bytes */
export const MAX_OUTPUT_BYTES = 50 * 1024;

export const TRUNCATION_MARKER = "\n[truncated]";

/**
 * Scrub environment values from text bound for a log line or report.
 * 1. By name: vars whose names match SECRET_ENV_NAMES → [REDACTED:<NAME>]
 * 2. By value: any other value of 8+ chars → [REDACTED]
 * Longer values go first so a value containing another is replaced whole.
 */
export function redact(output: string, env: Record<string, string | undefined>): string {
  let result = output;

  const entries = Object.entries(env)
    .filter((e): e is [string, string] => e[1] !== undefined && e[1].length >= 8)
    .sort((a, b) => b[1].length - a[1].length);

  for (const [name, value] of entries) {
    const isSecretName = SECRET_ENV_NAMES.some((p) => p.test(name));
    const replacement = isSecretName ? `[REDACTED:${name}]` : "[REDACTED]";
    result = result.split(value).join(replacement);
  }

  return result;
}

/** Cut to at most maxBytes of UTF-8, appending TRUNCATION_MARKER when anything was dropped */
export function truncate(output: string, maxBytes: number): string {
  const buf = Buffer.from(output, "utf-8");
  if (buf.length <= maxBytes) return output;
  // Back off to a character boundary so no replacement char appears
  let end = maxBytes;
  while (end > 0 && ((buf[end] ?? 0) & 0xc0) === 0x80) end--;
  return buf.subarray(0, end).toString("utf-8") + TRUNCATION_MARKER;
}
