import { open } from "node:fs/promises";
import type { ContextRef, RedactionReport } from "../../contracts/types.js";
import { errorMessage } from "../errors.js";
import { isSensitivePath, type SecretGuard } from "../guard/secret-guard.js";
import { resolveConfined } from "../util/path.js";
import { truncate } from "../util/sanitize.js";

/** Read access to repository files by index path */
export interface FileSource {
  /** At most maxBytes from the start of the file */
  read(path: string, maxBytes: number): Promise<Buffer>;
}

/** Files under a checkout root; paths that escape the root are refused */
export function createDirectorySource(root: string): FileSource {
  return {
    async read(path: string, maxBytes: number): Promise<Buffer> {
      const target = resolveConfined(root, path);
      const handle = await open(target, "r");
      try {
        const buf = Buffer.alloc(maxBytes);
        const { bytesRead } = await handle.read(buf, 0, maxBytes, 0);
        return buf.subarray(0, bytesRead);
      } finally {
        await handle.close();
      }
    },
  };
}

export interface ContextLimits {
  /** Per-file excerpt cap */
  maxExcerptBytes: number;
  /** Cap on the whole packaged context, framing included */
  maxTotalContextBytes: number;
}

/** Room left under this is not worth another excerpt */
export const MIN_EXCERPT_BYTES = 512;

export type ExclusionKind = "sensitive_path" | "unreadable" | "unscannable" | "context_full";

export interface ExcludedFile {
  path: string;
  kind: ExclusionKind;
  detail?: string;
}

export interface PackagedContext {
  /** Redacted excerpts framed for the prompt */
  text: string;
  /** Paths whose excerpts are in `text` */
  files: string[];
  excluded: ExcludedFile[];
  /** One per file that was read and scanned */
  reports: RedactionReport[];
  /** Redacted entries across all reports */
  redactions: number;
}

function frame(path: string, body: string): string {
  return `### File: ${path}\n\`\`\`\n${body}\n\`\`\`\n`;
}

/** Decode a prefix read, dropping a character cut in half at the end */
function decodeExcerpt(buf: Buffer, cap: number): string {
  const text = buf.toString("utf8");
  return buf.length === cap ? text.replace(/\uFFFD+$/, "") : text;
}

/**
 * Assemble the context for one job. Every excerpt passes through the guard
 * before it is included; sensitive paths are never read.
 */
export async function packageContext(
  refs: readonly ContextRef[],
  source: FileSource,
  guard: SecretGuard,
  limits: ContextLimits,
): Promise<PackagedContext> {
  const blocks: string[] = [];
  const files: string[] = [];
  const excluded: ExcludedFile[] = [];
  const reports: RedactionReport[] = [];
  let remaining = limits.maxTotalContextBytes;

  for (const ref of refs) {
    if (isSensitivePath(ref.path)) {
      excluded.push({ path: ref.path, kind: "sensitive_path" });
      continue;
    }
    const framing = Buffer.byteLength(frame(ref.path, ""));
    const room = remaining - framing;
    if (room < MIN_EXCERPT_BYTES) {
      excluded.push({ path: ref.path, kind: "context_full" });
      continue;
    }
    const cap = Math.min(ref.maxBytes, limits.maxExcerptBytes, room);
    if (cap <= 0) {
      excluded.push({ path: ref.path, kind: "unreadable", detail: "empty excerpt" });
      continue;
    }

    let raw: Buffer;
    try {
      raw = await source.read(ref.path, cap);
    } catch (err) {
      excluded.push({ path: ref.path, kind: "unreadable", detail: errorMessage(err) });
      continue;
    }

    const { text, report } = guard.sanitize(decodeExcerpt(raw, cap), ref.path);
    reports.push(report);
    if (report.unscannable) {
      excluded.push({ path: ref.path, kind: "unscannable" });
      continue;
    }

    // Placeholders can outgrow what they replace
    const body = Buffer.byteLength(text) > room ? truncate(text, room - 16) : text;
    const block = frame(ref.path, body);
    blocks.push(block);
    files.push(ref.path);
    remaining -= Buffer.byteLength(block);
  }

  return {
    text: blocks.join("\n"),
    files,
    excluded,
    reports,
    redactions: reports.reduce((sum, r) => sum + r.redactedCount, 0),
  };
}
