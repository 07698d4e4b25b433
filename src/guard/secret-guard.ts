import { basename, extname } from "node:path";
import type { RedactionEntry, RedactionReport, Severity } from "../../contracts/types.js";
import { ConfigError } from "../errors.js";
import { compareStrings } from "../util/canonical.js";
import {
  SECRET_PATTERNS,
  SENSITIVE_EXTENSIONS,
  SENSITIVE_FILENAMES,
  type SecretPattern,
} from "./patterns.js";

/** Pattern supplied through configuration; `regex` is a RegExp source string */
export interface ExtraPattern {
  name: string;
  regex: string;
  flags?: string;
  severity: Severity;
  confidence: number;
}

export interface GuardConfig {
  /** Candidates at or above this confidence are redacted */
  minConfidence: number;
  /** Shannon entropy (bits/char) a token must exceed to be flagged */
  entropyThreshold: number;
  /** Shortest token the entropy heuristic looks at */
  entropyMinLength: number;
  /** Confidence assigned to entropy findings */
  entropyConfidence: number;
  extraPatterns: ExtraPattern[];
}

export const DEFAULT_GUARD_CONFIG: GuardConfig = {
  minConfidence: 0.5,
  entropyThreshold: 4.0,
  entropyMinLength: 20,
  entropyConfidence: 0.6,
  extraPatterns: [],
};

export const ENTROPY_PATTERN_NAME = "high_entropy_string";

export interface SanitizeResult {
  /** Safe for transmission. Empty when the input was unscannable. */
  text: string;
  report: RedactionReport;
}

export interface SecretGuard {
  readonly config: GuardConfig;
  sanitize(text: unknown, source: string): SanitizeResult;
}

interface Candidate {
  pattern: string;
  severity: Severity;
  confidence: number;
  /** UTF-16 indices into the scanned string */
  from: number;
  to: number;
  redact: boolean;
}

const UNSCANNABLE_SAMPLE_CHARS = 8192;
const UNSCANNABLE_RATIO = 0.1;

/** Shannon entropy in bits per character */
export function shannonEntropy(data: string): number {
  if (data.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const ch of data) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  const length = [...data].length;
  let entropy = 0;
  for (const count of counts.values()) {
    const freq = count / length;
    entropy -= freq * Math.log2(freq);
  }
  return entropy;
}

/**
 * Files that must never be read into memory at all.
 * Callers check this before touching file bytes; sanitize() is not a substitute.
 */
export function isSensitivePath(filePath: string): boolean {
  const name = basename(filePath.replace(/\\/g, "/")).toLowerCase();
  if (SENSITIVE_FILENAMES.has(name)) return true;
  if (name.startsWith(".env.") && !name.endsWith(".example") && !name.endsWith(".sample")) {
    return true;
  }
  const ext = extname(name);
  if (SENSITIVE_EXTENSIONS.has(ext)) return true;
  return name.includes("private") && (name.includes("key") || ext === ".pem");
}

function lengthClass(bytes: number): "s" | "m" | "l" {
  if (bytes < 16) return "s";
  if (bytes < 64) return "m";
  return "l";
}

export function placeholder(patternName: string, bytes: number): string {
  return `[REDACTED:${patternName}:${lengthClass(bytes)}]`;
}

function isUnscannable(text: string): boolean {
  if (text.includes("\u0000")) return true;
  const sample = text.slice(0, UNSCANNABLE_SAMPLE_CHARS);
  if (sample.length === 0) return false;
  let suspicious = 0;
  for (let i = 0; i < sample.length; i++) {
    const code = sample.charCodeAt(i);
    if (code === 0xfffd || (code < 32 && code !== 9 && code !== 10 && code !== 13)) {
      suspicious++;
    }
  }
  return suspicious / sample.length > UNSCANNABLE_RATIO;
}

function compileExtraPatterns(extra: ExtraPattern[]): SecretPattern[] {
  return extra.map((p) => {
    const flags = p.flags ?? "";
    try {
      return {
        name: p.name,
        regex: new RegExp(p.regex, flags.includes("g") ? flags : `${flags}g`),
        severity: p.severity,
        confidence: p.confidence,
      };
    } catch (err) {
      throw new ConfigError(`Invalid secret pattern "${p.name}": ${String(err)}`, { cause: err });
    }
  });
}

interface EntropyRule {
  regex: RegExp;
  /** Characters of the match that follow the token */
  trailing: number;
}

function entropyRules(minLength: number): EntropyRule[] {
  const token = `[A-Za-z0-9+/=_.-]{${minLength},}`;
  return [
    // quoted: "token" or 'token' or `token`
    { regex: new RegExp(`(['"\`])(${token})\\1`, "g"), trailing: 1 },
    // assignment: name = token / name: token
    { regex: new RegExp(`\\b[A-Za-z_][A-Za-z0-9_.-]*\\s*[:=]\\s*(${token})`, "g"), trailing: 0 },
  ];
}

function byteLength(text: string, from: number, to: number): number {
  return Buffer.byteLength(text.slice(from, to), "utf8");
}

function overlaps(c: { from: number; to: number }, others: Candidate[]): boolean {
  return others.some((o) => c.from < o.to && o.from < c.to);
}

export function createSecretGuard(overrides: Partial<GuardConfig> = {}): SecretGuard {
  const config: GuardConfig = { ...DEFAULT_GUARD_CONFIG, ...overrides };
  const patterns = [...SECRET_PATTERNS, ...compileExtraPatterns(config.extraPatterns)];
  const entropy = entropyRules(config.entropyMinLength);

  function classify(confidence: number, severity: Severity): { keep: boolean; redact: boolean } {
    if (confidence >= config.minConfidence) return { keep: true, redact: true };
    // Below threshold: only informational findings are worth keeping in the audit
    return { keep: severity === "informational", redact: false };
  }

  function detect(text: string): Candidate[] {
    const found: Candidate[] = [];

    for (const p of patterns) {
      for (const m of text.matchAll(p.regex)) {
        if (m[0].length === 0 || m.index === undefined) continue;
        const { keep, redact } = classify(p.confidence, p.severity);
        if (!keep) continue;
        found.push({
          pattern: p.name,
          severity: p.severity,
          confidence: p.confidence,
          from: m.index,
          to: m.index + m[0].length,
          redact,
        });
      }
    }

    for (const rule of entropy) {
      for (const m of text.matchAll(rule.regex)) {
        if (m.index === undefined) continue;
        const token = m[m.length - 1];
        if (!token || shannonEntropy(token) <= config.entropyThreshold) continue;
        const from = m.index + m[0].length - rule.trailing - token.length;
        const span = { from, to: from + token.length };
        if (overlaps(span, found.filter((f) => f.redact))) continue;
        const { keep, redact } = classify(config.entropyConfidence, "medium");
        if (!keep) continue;
        found.push({
          pattern: ENTROPY_PATTERN_NAME,
          severity: "medium",
          confidence: config.entropyConfidence,
          ...span,
          redact,
        });
      }
    }

    return found;
  }

  function sanitize(text: unknown, source: string): SanitizeResult {
    if (typeof text !== "string" || isUnscannable(text)) {
      return {
        text: "",
        report: Object.freeze({
          source,
          entries: Object.freeze([]),
          total: 0,
          redactedCount: 0,
          unscannable: true,
          patternCounts: Object.freeze({}),
        }),
      };
    }

    const candidates = detect(text).sort(
      (a, b) => a.from - b.from || compareStrings(a.pattern, b.pattern),
    );

    // Merge overlapping redacted spans; the strongest member names the placeholder
    const clusters: Array<{ from: number; to: number; lead: Candidate }> = [];
    for (const c of candidates) {
      if (!c.redact) continue;
      const last = clusters[clusters.length - 1];
      if (last && c.from < last.to) {
        last.to = Math.max(last.to, c.to);
        if (c.confidence > last.lead.confidence) last.lead = c;
      } else {
        clusters.push({ from: c.from, to: c.to, lead: c });
      }
    }

    let out = "";
    let cursor = 0;
    for (const cl of clusters) {
      out += text.slice(cursor, cl.from);
      out += placeholder(cl.lead.pattern, byteLength(text, cl.from, cl.to));
      cursor = cl.to;
    }
    out += text.slice(cursor);

    const patternCounts: Record<string, number> = {};
    const entries: RedactionEntry[] = candidates.map((c) => {
      const start = byteLength(text, 0, c.from);
      const length = byteLength(text, c.from, c.to);
      if (c.redact) patternCounts[c.pattern] = (patternCounts[c.pattern] ?? 0) + 1;
      return Object.freeze({
        pattern: c.pattern,
        severity: c.severity,
        start,
        end: start + length,
        length,
        confidence: c.confidence,
        redacted: c.redact,
      });
    });

    return {
      text: out,
      report: Object.freeze({
        source,
        entries: Object.freeze(entries),
        total: entries.length,
        redactedCount: entries.filter((e) => e.redacted).length,
        unscannable: false,
        patternCounts: Object.freeze(patternCounts),
      }),
    };
  }

  return { config, sanitize };
}

const defaultGuard = createSecretGuard();

/** Sanitize with the default pattern catalog and thresholds */
export function sanitize(text: unknown, source: string): SanitizeResult {
  return defaultGuard.sanitize(text, source);
}

/** Redacted-entry counts per pattern across many reports */
export function summarizeRedactions(reports: Iterable<RedactionReport>): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const r of reports) {
    for (const [name, count] of Object.entries(r.patternCounts)) {
      summary[name] = (summary[name] ?? 0) + count;
    }
  }
  return Object.fromEntries(Object.entries(summary).sort(([a], [b]) => compareStrings(a, b)));
}
