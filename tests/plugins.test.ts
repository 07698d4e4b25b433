import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createDefaultRegistry } from "../candidates/index.js";
import { loadPluginFromFile, loadPluginsFromDirectory } from "../src/catalog/plugins.js";
import { CandidateRegistry } from "../src/catalog/registry.js";
import { ConfigError } from "../src/errors.js";

const PLUGIN = `export default function (api) {
  api.registerCandidate(
    api.candidate("PLUGIN.md", "docs", {
      description: "From a plugin",
      base: { reusability: 5, timeSaved: 5, leverage: 5 },
      context: [api.contextFile(/^src\\//, "Source")],
      instructions: "Write the plugin guide.",
    }),
  );
  api.registerPostProcessor({
    name: "footer",
    priority: 5,
    families: ["docs"],
    process: (text) => text + "\\n<!-- generated -->\\n",
  });
}
`;

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "docsmith-plugins-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadPluginsFromDirectory", () => {
  test("loads plugin modules in name order and skips the rest", async () => {
    await writeFile(join(dir, "b-guide.mjs"), PLUGIN);
    await writeFile(
      join(dir, "a-upper.mjs"),
      `export default (api) => api.registerPostProcessor({ name: "upper", process: (t) => t.toUpperCase() });\n`,
    );
    await writeFile(join(dir, "_shared.mjs"), `export default () => { throw new Error("helper loaded"); };\n`);
    await writeFile(join(dir, "notes.txt"), "not a plugin");

    const registry = createDefaultRegistry();
    const before = registry.size;
    const loaded = await loadPluginsFromDirectory(dir, registry);

    expect(loaded).toEqual([join(dir, "a-upper.mjs"), join(dir, "b-guide.mjs")]);
    expect(registry.size).toBe(before + 1);
    expect(registry.get("PLUGIN.md")?.outputPath).toBe("docs/PLUGIN.md");
    expect(registry.postProcessorsFor("docs").map((p) => p.name)).toEqual(["upper", "footer"]);
    expect(registry.postProcessorsFor("tests").map((p) => p.name)).toEqual(["upper"]);
  });

  test("a missing directory is a config error", async () => {
    await expect(loadPluginsFromDirectory(join(dir, "none"), new CandidateRegistry())).rejects.toThrow(
      `Plugin directory ${join(dir, "none")}: not found`,
    );
  });
});

describe("loadPluginFromFile", () => {
  test("a module without a function default export is rejected", async () => {
    const path = join(dir, "bad.mjs");
    await writeFile(path, `export const name = "bad";\n`);
    const err = await loadPluginFromFile(path, new CandidateRegistry()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toHaveProperty("message", `Invalid plugin ${path}: default export must be a function`);
  });

  test("a plugin that throws is a config error naming the file", async () => {
    const path = join(dir, "throws.mjs");
    await writeFile(path, `export default () => { throw new Error("nope"); };\n`);
    await expect(loadPluginFromFile(path, new CandidateRegistry())).rejects.toThrow(`Plugin ${path} failed: nope`);
  });

  test("a plugin may not replace a built-in candidate", async () => {
    const registry = createDefaultRegistry();
    const taken = registry.list()[0]?.name ?? "";
    const path = join(dir, "dup.mjs");
    await writeFile(
      path,
      `export default (api) => api.registerCandidate(api.candidate(${JSON.stringify(taken)}, "docs", {
  description: "dup",
  base: { reusability: 1, timeSaved: 1, leverage: 1 },
  instructions: "x",
}));\n`,
    );
    await expect(loadPluginFromFile(path, registry)).rejects.toThrow(
      `Plugin ${path} failed: Duplicate candidate name: "${taken}"`,
    );
  });

  test("a module that does not parse is a config error", async () => {
    const path = join(dir, "syntax.mjs");
    await writeFile(path, "export default (\n");
    await expect(loadPluginFromFile(path, new CandidateRegistry())).rejects.toThrow(ConfigError);
  });
});

describe("CandidateRegistry post-processors", () => {
  test("duplicate names are rejected", () => {
    const registry = new CandidateRegistry().registerPostProcessor({ name: "x", process: (t) => t });
    expect(() => registry.registerPostProcessor({ name: "x", process: (t) => t })).toThrow(
      'Duplicate post-processor name: "x"',
    );
  });

  test("equal priorities keep registration order", () => {
    const registry = new CandidateRegistry()
      .registerPostProcessor({ name: "first", process: (t) => t })
      .registerPostProcessor({ name: "early", priority: -1, process: (t) => t })
      .registerPostProcessor({ name: "second", process: (t) => t });
    expect(registry.postProcessorsFor("api").map((p) => p.name)).toEqual(["early", "first", "second"]);
  });
});
