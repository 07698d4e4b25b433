import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

export const runbook: CandidateProvider = candidate("RUNBOOK.md", "docs", {
  description: "Step-by-step guide for running, building and testing the project",
  base: { reusability: 8, timeSaved: 7, leverage: 7 },
  boostedByGaps: ["README is minimal", "No architecture documentation"],
  context: [
    contextFile(/(^|\/)\.env\.example$/, "Environment variables"),
    contextFile(/^scripts\/[^/]+\.(sh|ts|js|py)$/, "Project scripts"),
    contextFile(/^\.github\/workflows\/[^/]+\.ya?ml$/, "CI pipeline"),
  ],
  instructions: `Create a RUNBOOK.md with these sections: Prerequisites, Quick Start, Development Setup, Building, Testing, Common Tasks.
Use only commands that appear in the manifests, Makefile or scripts.`,
});

export const troubleshooting: CandidateProvider = candidate("TROUBLESHOOTING.md", "docs", {
  description: "Common issues, error messages and their fixes",
  base: { reusability: 7, timeSaved: 8, leverage: 6 },
  boostedByGaps: ["No CONTRIBUTING guide"],
  context: [
    contextFile(/(^|\/)errors?\.(ts|js|py|go|rs)$/, "Error definitions"),
    contextFile(/(^|\/)config\.(ts|js|py|go|rs|ya?ml|toml)$/, "Configuration"),
  ],
  instructions: `Create a TROUBLESHOOTING.md. For each problem give the symptom, the likely cause and the fix.
Group entries by setup, build, runtime and tests.`,
});

export const architecture: CandidateProvider = candidate("ARCHITECTURE_OVERVIEW.md", "docs", {
  description: "High-level system architecture and component relationships",
  maxOutputTokens: 8192,
  base: { reusability: 9, timeSaved: 6, leverage: 8 },
  boostedByGaps: ["No architecture documentation"],
  context: [
    contextFile(/^src\/(index|main|app|server)\.(ts|js|py|go|rs)$/, "Entry point"),
    contextFile(/(^|\/)(main|app)\.(py|go|rs)$/, "Entry point"),
    contextFile(/^docs\/[^/]+\.md$/, "Existing documentation"),
  ],
  instructions: `Create an ARCHITECTURE_OVERVIEW.md covering the main components, how data flows between them, external dependencies and deployment shape.
Include a text diagram.`,
});

export const DOCS_CANDIDATES: CandidateProvider[] = [runbook, troubleshooting, architecture];
