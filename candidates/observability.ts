import { candidate, contextFile } from "../src/catalog/dsl.js";
import type { CandidateProvider } from "../src/catalog/types.js";

export const loggingConventions: CandidateProvider = candidate("LOGGING_CONVENTIONS.md", "observability", {
  description: "Structured logging conventions for the codebase",
  base: { reusability: 7, timeSaved: 6, leverage: 6 },
  context: [contextFile(/(^|\/)(log|logger|logging)[^/]*\.(ts|js|py|go|rs)$/i, "Logging setup")],
  instructions: `Create LOGGING_CONVENTIONS.md: levels and when to use them, required fields, what must never be logged, and examples in the project's language.`,
});

export const metricsPlan: CandidateProvider = candidate("METRICS_PLAN.md", "observability", {
  description: "Metrics and monitoring plan with recommended instruments",
  base: { reusability: 7, timeSaved: 7, leverage: 7 },
  context: [contextFile(/(^|\/)(metrics?|telemetry|monitoring)[^/]*\.(ts|js|py|go|rs)$/i, "Existing instrumentation")],
  instructions: `Create METRICS_PLAN.md: service-level indicators, the counters, gauges and histograms to add with names and labels, and alert thresholds.`,
});

export const OBSERVABILITY_CANDIDATES: CandidateProvider[] = [loggingConventions, metricsPlan];
