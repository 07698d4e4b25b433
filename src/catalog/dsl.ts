import type {
  ArtifactFamily,
  ContextRef,
  RepoIndex,
  RepoSignals,
  SignalFlag,
} from "../../contracts/types.js";
import { isSensitivePath } from "../guard/secret-guard.js";
import type {
  BaseWeights,
  CandidateProvider,
  ContextPattern,
  PromptInput,
  PromptParts,
} from "./types.js";

export const BASE_SYSTEM_PROMPT = `You are a senior software engineer writing documentation artifacts for a software project.

Rules:
1. Only describe what you can verify from the provided context.
2. When information is missing, write "UNKNOWN - verify by ..." instead of guessing.
3. Never invent file paths, function names or commands.
4. Prefer concrete examples taken from the provided code.`;

/** Files worth including for every candidate, in priority order */
export const KEY_FILES: readonly ContextPattern[] = [
  { match: /^readme(\.md|\.rst|\.txt)?$/i, reason: "Primary documentation" },
  { match: /^(package\.json|pyproject\.toml|Cargo\.toml|go\.mod)$/, reason: "Project manifest" },
  { match: /^Makefile$/, reason: "Build and run commands" },
  { match: /^Dockerfile$/, reason: "Container configuration" },
  { match: /^docker-compose\.ya?ml$/, reason: "Service orchestration" },
];

/** Global and sticky regexes keep lastIndex between `test` calls; drop those flags */
function stateless(match: RegExp): RegExp {
  return match.global || match.sticky ? new RegExp(match.source, match.flags.replace(/[gy]/g, "")) : match;
}

export function contextFile(match: RegExp, reason: string): ContextPattern {
  return { match: stateless(match), reason };
}

function matchingPaths(index: RepoIndex, patterns: readonly ContextPattern[]): Array<{ path: string; reason: string }> {
  const out: Array<{ path: string; reason: string }> = [];
  const seen = new Set<string>();
  for (const p of patterns) {
    for (const f of index.files) {
      if (f.isBinary || seen.has(f.path) || !p.match.test(f.path)) continue;
      seen.add(f.path);
      out.push({ path: f.path, reason: p.reason });
    }
  }
  return out;
}

export interface CandidateOptions {
  description: string;
  outputPath?: string;
  maxOutputTokens?: number;
  base: BaseWeights;
  requiredSignals?: SignalFlag[];
  boostedByGaps?: string[];
  context?: ContextPattern[];
  applicable?: (signals: RepoSignals) => boolean;
  /** Instructions for the artifact; the packaged context is appended */
  instructions: string;
  system?: string;
  prompt?: (input: PromptInput) => PromptParts;
  /** Rewrite the generated text before it is written */
  postProcess?: (content: string) => string;
}

/** Define an artifact candidate with the default selection and prompt behaviour */
export function candidate(
  name: string,
  family: ArtifactFamily,
  opts: CandidateOptions,
): CandidateProvider {
  const contextPatterns = (opts.context ?? []).map((p) => ({ match: stateless(p.match), reason: p.reason }));
  const system = opts.system ?? BASE_SYSTEM_PROMPT;

  return {
    name,
    family,
    description: opts.description,
    outputPath: opts.outputPath ?? `${family}/${name}`,
    maxOutputTokens: opts.maxOutputTokens ?? 4096,
    base: opts.base,
    requiredSignals: opts.requiredSignals ?? [],
    boostedByGaps: opts.boostedByGaps ?? [],
    contextPatterns,

    isApplicable(signals: RepoSignals): boolean {
      return opts.applicable ? opts.applicable(signals) : true;
    },

    relevantFiles(index: RepoIndex): string[] {
      return matchingPaths(index, contextPatterns).map((m) => m.path);
    },

    selectContext(index: RepoIndex, maxRefs: number, maxBytes: number): ContextRef[] {
      const sizes = new Map(index.files.map((f) => [f.path, f.sizeBytes]));
      return matchingPaths(index, [...KEY_FILES, ...contextPatterns])
        .filter((m) => !isSensitivePath(m.path))
        .slice(0, maxRefs)
        .map((m) => ({
          path: m.path,
          maxBytes: Math.min(maxBytes, sizes.get(m.path) ?? maxBytes),
          reason: m.reason,
        }));
    },

    postProcess: opts.postProcess,

    buildPrompt(input: PromptInput): PromptParts {
      if (opts.prompt) return opts.prompt(input);
      const context = input.context.length > 0 ? input.context : "No repository excerpts available.";
      return {
        system,
        user: `${opts.instructions}\n\nWrite ${input.job.outputPath}.\n\n## Repository context\n\n${context}`,
      };
    },
  };
}
