import { canonicalJson, sha256Hex } from "../util/canonical.js";

/** Everything that determines a generation's output */
export interface FingerprintInput {
  model: string;
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
}

const FINGERPRINT_RE = /^[0-9a-f]{64}$/;

/** SHA-256 over the canonical JSON of the request; only these five fields contribute */
export function fingerprintOf(input: FingerprintInput): string {
  return sha256Hex(
    canonicalJson({
      model: input.model,
      system: input.system,
      user: input.user,
      maxTokens: input.maxTokens,
      temperature: input.temperature,
    }),
  );
}

export function isFingerprint(value: string): boolean {
  return FINGERPRINT_RE.test(value);
}
