import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PlanInputError } from "../src/errors.js";
import { readJsonIfExists, writeFileAtomic } from "../src/util/fs.js";
import { assertPathConfined, resolveConfined } from "../src/util/path.js";
import { generateRunId, validateDirectory } from "../src/util/preflight.js";
import { MAX_OUTPUT_BYTES, TRUNCATION_MARKER, redact, truncate } from "../src/util/sanitize.js";

describe("redact", () => {
  test("named secrets get a labelled placeholder", () => {
    expect(redact("key is test-secret-value", { API_KEY: "test-secret-value" })).toBe(
      "key is [REDACTED:API_KEY]",
    );
  });

  test("other long values are masked without a name", () => {
    expect(redact("home /home/someone/x", { HOME: "/home/someone" })).toBe("home [REDACTED]/x");
  });

  test("values shorter than 8 chars are left alone", () => {
    expect(redact("user bob", { USER: "bob" })).toBe("user bob");
  });

  test("undefined values are ignored", () => {
    expect(redact("nothing", { MISSING: undefined })).toBe("nothing");
  });

  test("a value containing another is replaced whole", () => {
    const env = { SHORT_TOKEN: "abcdefgh", LONG_TOKEN: "abcdefgh-12345678" };
    expect(redact("abcdefgh-12345678 abcdefgh", env)).toBe("[REDACTED:LONG_TOKEN] [REDACTED:SHORT_TOKEN]");
  });

  test.each(["DB_PASSWORD", "github_token", "CLIENT_SECRET", "GCP_CREDENTIAL", "api_key"])(
    "%s is a secret name",
    (name) => {
      expect(redact("v=placeholder-1", { [name]: "placeholder-1" })).toBe(`v=[REDACTED:${name}]`);
    },
  );
});

describe("truncate", () => {
  test("short output is unchanged", () => {
    expect(truncate("hello", 10)).toBe("hello");
  });

  test("long output is cut and marked", () => {
    expect(truncate("hello world", 5)).toBe("hello" + TRUNCATION_MARKER);
  });

  test("never splits a multi-byte character", () => {
    // "é" is two bytes; a 2-byte cap keeps only "a"
    expect(truncate("aéb", 2)).toBe("a" + TRUNCATION_MARKER);
  });

  test("default cap", () => {
    const out = truncate("x".repeat(MAX_OUTPUT_BYTES + 10), MAX_OUTPUT_BYTES);
    expect(out).toBe("x".repeat(MAX_OUTPUT_BYTES) + TRUNCATION_MARKER);
  });
});

describe("paths", () => {
  test("assertPathConfined accepts children", () => {
    expect(() => assertPathConfined("/srv/out/a/b.md", "/srv/out")).not.toThrow();
  });

  test.each(["/srv/out", "/srv/other", "/srv/out/../x"])("assertPathConfined rejects %s", (p) => {
    expect(() => assertPathConfined(p, "/srv/out")).toThrow(/confinement/);
  });

  test("resolveConfined joins relative paths", () => {
    expect(resolveConfined("/srv/out", "docs/a.md")).toBe("/srv/out/docs/a.md");
  });

  test("resolveConfined rejects absolute and escaping paths", () => {
    expect(() => resolveConfined("/srv/out", "/etc/passwd")).toThrow(/absolute/);
    expect(() => resolveConfined("/srv/out", "../x")).toThrow(/confinement/);
  });
});

describe("preflight", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "docsmith-util-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("generateRunId is 8 hex chars", () => {
    expect(generateRunId()).toMatch(/^[0-9a-f]{8}$/);
  });

  test("validateDirectory accepts a directory", async () => {
    await expect(validateDirectory(dir, "Repo")).resolves.toBeUndefined();
  });

  test("validateDirectory rejects a missing path", async () => {
    const missing = join(dir, "nope");
    await expect(validateDirectory(missing, "Repo")).rejects.toThrow(`Repo ${missing} does not exist`);
  });

  test("validateDirectory rejects a file", async () => {
    const file = join(dir, "f.txt");
    await writeFile(file, "x");
    const err = await validateDirectory(file, "Repo").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PlanInputError);
    expect(err).toHaveProperty("message", `Repo ${file} is not a directory`);
  });

  test("writeFileAtomic creates parents and leaves no temp files", async () => {
    const target = join(dir, "a", "b", "out.json");
    await writeFileAtomic(target, "one");
    await writeFileAtomic(target, "two");
    expect(await readFile(target, "utf8")).toBe("two");
    expect(await readdir(join(dir, "a", "b"))).toEqual(["out.json"]);
  });

  test("readJsonIfExists", async () => {
    const file = join(dir, "data.json");
    expect(await readJsonIfExists(file)).toBeUndefined();
    await writeFile(file, '{"a":1}');
    expect(await readJsonIfExists(file)).toEqual({ a: 1 });
  });
});
