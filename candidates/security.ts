import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

const AUTH_FILES = contextFile(/(^|\/)(auth|session|login|permissions?|middleware)[^/]*\.(ts|js|py|go|rs|rb)$/i, "Auth code");

export const threatModel: CandidateProvider = candidate("THREAT_MODEL.md", "security", {
  description: "Threat analysis of the system using STRIDE",
  maxOutputTokens: 8192,
  base: { reusability: 7, timeSaved: 9, leverage: 8 },
  boostedByGaps: ["No SECURITY policy", "security documentation may be lacking"],
  context: [
    AUTH_FILES,
    contextFile(/(^|\/)(routes?|api|handlers?)\/[^/]+\.(ts|js|py|go|rb)$/, "Request handlers"),
  ],
  instructions: `Create a THREAT_MODEL.md using STRIDE. List assets, trust boundaries, entry points, threats with likelihood and impact, and mitigations present in the code.`,
});

export const securityChecklist: CandidateProvider = candidate("SECURITY_CHECKLIST.md", "security", {
  description: "Security review checklist for the project's stack",
  base: { reusability: 8, timeSaved: 7, leverage: 7 },
  boostedByGaps: ["No SECURITY policy"],
  context: [contextFile(/^\.github\/dependabot\.ya?ml$/, "Dependency updates")],
  instructions: `Create a SECURITY_CHECKLIST.md tailored to the detected stack: dependency hygiene, secrets handling, input validation, authn/authz, logging of sensitive data, deployment hardening.`,
});

export const authNotes: CandidateProvider = candidate("AUTHZ_AUTHN_NOTES.md", "security", {
  description: "Authentication and authorization flows",
  base: { reusability: 7, timeSaved: 8, leverage: 7 },
  requiredSignals: ["hasAuth"],
  boostedByGaps: ["security documentation may be lacking"],
  context: [AUTH_FILES],
  instructions: `Create AUTHZ_AUTHN_NOTES.md describing how users authenticate, how sessions or tokens are issued and validated, and how permissions are checked.`,
});

export const SECURITY_CANDIDATES: CandidateProvider[] = [threatModel, securityChecklist, authNotes];
