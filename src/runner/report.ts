import type { JobResult, OutcomeCounts, Report, TokenUsage } from "../../contracts/types.js";
import { PlanInputError, errorMessage } from "../errors.js";
import { ReportSchema, describeIssues } from "../schemas.js";
import { readJsonIfExists, writeFileAtomic } from "../util/fs.js";

export const REPORT_FILE = "report.json";

export function countOutcomes(results: readonly JobResult[]): OutcomeCounts {
  const counts: OutcomeCounts = { completed: 0, skipped: 0, failed: 0 };
  for (const r of results) counts[r.outcome]++;
  return counts;
}

export function addUsage(into: TokenUsage, usage: TokenUsage): void {
  into.inputTokens += usage.inputTokens;
  into.outputTokens += usage.outputTokens;
}

export async function saveReport(path: string, report: Report): Promise<void> {
  await writeFileAtomic(path, JSON.stringify(report, null, 2) + "\n");
}

/** The persisted report, or undefined when none exists yet */
export async function loadReport(path: string): Promise<Report | undefined> {
  let data: unknown;
  try {
    data = await readJsonIfExists(path);
  } catch (err) {
    throw new PlanInputError(`Cannot read report at ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (data === undefined) return undefined;
  const parsed = ReportSchema.safeParse(data);
  if (!parsed.success) {
    throw new PlanInputError(`Invalid report at ${path}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
