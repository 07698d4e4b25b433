import { readdir } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";
import { errnoCode } from "../util/fs.js";
import { candidate, contextFile } from "./dsl.js";
import type { CandidateRegistry } from "./registry.js";
import type { CandidateProvider, PostProcessor } from "./types.js";

/** What a plugin module's default export receives */
export interface PluginApi {
  candidate: typeof candidate;
  contextFile: typeof contextFile;
  registerCandidate(provider: CandidateProvider): void;
  registerPostProcessor(processor: PostProcessor): void;
}

export type Plugin = (api: PluginApi) => void | Promise<void>;

const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

const PluginModule = z.object({
  default: z.custom<Plugin>((v) => typeof v === "function", "default export must be a function"),
});

function apiFor(registry: CandidateRegistry): PluginApi {
  return {
    candidate,
    contextFile,
    registerCandidate: (provider) => {
      registry.register(provider);
    },
    registerPostProcessor: (processor) => {
      registry.registerPostProcessor(processor);
    },
  };
}

/**
 * Import one ES module and hand its default export the registry. Any
 * failure (import, shape, or the plugin itself) is a ConfigError naming the file.
 */
export async function loadPluginFromFile(path: string, registry: CandidateRegistry): Promise<void> {
  const target = resolve(path);
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(target).href);
  } catch (err) {
    throw new ConfigError(`Cannot load plugin ${target}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = PluginModule.safeParse(mod);
  if (!parsed.success) {
    throw new ConfigError(`Invalid plugin ${target}: default export must be a function`);
  }
  try {
    await parsed.data.default(apiFor(registry));
  } catch (err) {
    throw new ConfigError(`Plugin ${target} failed: ${errorMessage(err)}`, { cause: err });
  }
}

/** Load every .js/.mjs file in a directory in name order; returns the loaded paths */
export async function loadPluginsFromDirectory(dir: string, registry: CandidateRegistry): Promise<string[]> {
  const root = resolve(dir);
  let names: string[];
  try {
    names = await readdir(root);
  } catch (err) {
    const reason = errnoCode(err) === "ENOENT" ? "not found" : errorMessage(err);
    throw new ConfigError(`Plugin directory ${root}: ${reason}`, { cause: err });
  }
  const files = names
    .filter((n) => PLUGIN_EXTENSIONS.has(extname(n)) && !n.startsWith("_"))
    .sort()
    .map((n) => join(root, n));
  for (const file of files) await loadPluginFromFile(file, registry);
  return files;
}
