import type { ArtifactFamily } from "../../contracts/types.js";
import { ConfigError, PlanInputError } from "../errors.js";
import type { CandidateProvider, PostProcessor } from "./types.js";

/** Named set of candidate providers and post-processors; built-ins plus anything registered at runtime */
export class CandidateRegistry {
  private readonly providers = new Map<string, CandidateProvider>();
  private readonly processors: PostProcessor[] = [];

  constructor(initial: Iterable<CandidateProvider> = []) {
    for (const p of initial) this.register(p);
  }

  register(provider: CandidateProvider): this {
    if (this.providers.has(provider.name)) {
      throw new PlanInputError(`Duplicate candidate name: "${provider.name}"`);
    }
    this.providers.set(provider.name, provider);
    return this;
  }

  registerPostProcessor(processor: PostProcessor): this {
    if (this.processors.some((p) => p.name === processor.name)) {
      throw new ConfigError(`Duplicate post-processor name: "${processor.name}"`);
    }
    this.processors.push(processor);
    return this;
  }

  get(name: string): CandidateProvider | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /** Registration order */
  list(): CandidateProvider[] {
    return [...this.providers.values()];
  }

  /** Processors for a family by ascending priority; ties keep registration order */
  postProcessorsFor(family: ArtifactFamily): PostProcessor[] {
    return this.processors
      .filter((p) => p.families === undefined || p.families.includes(family))
      .map((p, i) => ({ p, i }))
      .sort((a, b) => (a.p.priority ?? 0) - (b.p.priority ?? 0) || a.i - b.i)
      .map(({ p }) => p);
  }

  get size(): number {
    return this.providers.size;
  }
}
