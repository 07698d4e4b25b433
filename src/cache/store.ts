import { randomBytes } from "node:crypto";
import { link, mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { CacheEntry } from "../../contracts/types.js";
import { CacheCorruptedError, CacheUnavailableError, errorMessage } from "../errors.js";
import { CacheEntrySchema, describeIssues } from "../schemas.js";
import { errnoCode } from "../util/fs.js";
import { isFingerprint } from "./fingerprint.js";

/** Content-addressed response store shared by runs */
export interface ResponseCache {
  readonly dir: string;
  has(fingerprint: string): Promise<boolean>;
  get(fingerprint: string): Promise<CacheEntry | undefined>;
  /** false when an entry already existed; the stored entry is never replaced */
  put(entry: CacheEntry): Promise<boolean>;
}

function assertFingerprint(fingerprint: string): void {
  if (!isFingerprint(fingerprint)) {
    throw new CacheCorruptedError(fingerprint, `Malformed fingerprint: "${fingerprint}"`);
  }
}

/**
 * Filesystem cache laid out as `<dir>/<fp[0..2]>/<fp>.json`.
 * Entries are written once: a temp file is hard-linked into place, so a
 * concurrent writer either wins or sees EEXIST, and readers never see a
 * partial file.
 */
export class FileCache implements ResponseCache {
  readonly dir: string;

  private constructor(dir: string) {
    this.dir = dir;
  }

  /** Create the directory if needed and prove it is writable */
  static async open(dir: string): Promise<FileCache> {
    const root = resolve(dir);
    const marker = join(root, `.writable-${randomBytes(4).toString("hex")}`);
    try {
      await mkdir(root, { recursive: true });
      await writeFile(marker, "");
      await rm(marker, { force: true });
    } catch (err) {
      throw new CacheUnavailableError(`Cache directory ${root} is not writable: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    return new FileCache(root);
  }

  pathFor(fingerprint: string): string {
    return join(this.dir, fingerprint.slice(0, 2), `${fingerprint}.json`);
  }

  async has(fingerprint: string): Promise<boolean> {
    assertFingerprint(fingerprint);
    try {
      const s = await stat(this.pathFor(fingerprint));
      return s.isFile();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw new CacheUnavailableError(`Cannot stat cache entry ${fingerprint}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    assertFingerprint(fingerprint);
    let raw: string;
    try {
      raw = await readFile(this.pathFor(fingerprint), "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return undefined;
      throw new CacheUnavailableError(`Cannot read cache entry ${fingerprint}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new CacheCorruptedError(fingerprint, `Cache entry ${fingerprint} is not valid JSON`, { cause: err });
    }
    const parsed = CacheEntrySchema.safeParse(data);
    if (!parsed.success) {
      throw new CacheCorruptedError(
        fingerprint,
        `Cache entry ${fingerprint} is invalid: ${describeIssues(parsed.error)}`,
      );
    }
    if (parsed.data.fingerprint !== fingerprint) {
      throw new CacheCorruptedError(
        fingerprint,
        `Cache entry ${fingerprint} records fingerprint ${parsed.data.fingerprint}`,
      );
    }
    return parsed.data;
  }

  async put(entry: CacheEntry): Promise<boolean> {
    assertFingerprint(entry.fingerprint);
    const target = this.pathFor(entry.fingerprint);
    const tmp = `${target}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      await mkdir(join(this.dir, entry.fingerprint.slice(0, 2)), { recursive: true });
      await writeFile(tmp, JSON.stringify(entry, null, 2) + "\n", "utf8");
      await link(tmp, target);
      return true;
    } catch (err) {
      if (errnoCode(err) === "EEXIST") return false;
      throw new CacheUnavailableError(`Cannot write cache entry ${entry.fingerprint}: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      await rm(tmp, { force: true });
    }
  }
}
