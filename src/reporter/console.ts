import type { JobResult, JobTransition, Report } from "../../contracts/types.js";
import type { Reporter } from "./types.js";
import { redact, truncate, MAX_OUTPUT_BYTES } from "../util/sanitize.js";

function icon(outcome: JobResult["outcome"]): string {
  return outcome === "completed" ? "+" : outcome === "skipped" ? "-" : "x";
}

export function createConsoleReporter(
  env: Record<string, string | undefined>,
): Reporter {
  function sanitize(text: string): string {
    return truncate(redact(text, env), MAX_OUTPUT_BYTES);
  }

  return {
    jobTransition(t: JobTransition): void {
      if (t.to !== "calling") return;
      const retry = t.attempt !== undefined && t.attempt > 1 ? ` (attempt ${t.attempt})` : "";
      process.stderr.write(`[calling] ${t.candidate}${retry} ...\n`);
    },

    jobComplete(result: JobResult): void {
      const detail =
        result.outcome === "skipped"
          ? `skipped: ${result.skipReason ?? "unknown"}`
          : `${result.outcome}, ${result.attempts} attempt${result.attempts === 1 ? "" : "s"}`;
      process.stderr.write(`[${icon(result.outcome)}] ${result.candidate} (${detail})\n`);
      if (result.error) {
        process.stderr.write(`    error: ${sanitize(result.error)}\n`);
      }
    },

    runComplete(report: Report): void {
      process.stderr.write("\n--- Run Summary ---\n");
      process.stderr.write(`Run ID:     ${report.runId}\n`);
      process.stderr.write(`Plan:       ${report.planId}\n`);
      process.stderr.write(
        `Jobs:       ${report.counts.completed} completed, ${report.counts.skipped} skipped, ${report.counts.failed} failed of ${report.totalJobs}\n`,
      );
      process.stderr.write(`Tokens:     ${report.usage.inputTokens}in / ${report.usage.outputTokens}out\n`);
      const redactions = Object.entries(report.redactionSummary);
      if (redactions.length > 0) {
        process.stderr.write(`Redactions: ${redactions.map(([k, v]) => `${k}=${v}`).join(", ")}\n`);
      }
      if (report.cancelled) {
        process.stderr.write("Cancelled:  yes (rerun to resume)\n");
      }
      process.stderr.write("---\n");
    },
  };
}
