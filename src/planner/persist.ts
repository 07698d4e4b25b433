import type { Plan } from "../../contracts/types.js";
import { PlanInputError, errorMessage } from "../errors.js";
import { PlanSchema, describeIssues } from "../schemas.js";
import { readJsonIfExists, writeFileAtomic } from "../util/fs.js";

/** Stable key order and trailing newline: the same Plan always writes the same bytes */
export function serializePlan(plan: Plan): string {
  return JSON.stringify(plan, null, 2) + "\n";
}

export async function savePlan(path: string, plan: Plan): Promise<void> {
  await writeFileAtomic(path, serializePlan(plan));
}

export function parsePlan(data: unknown, source = "plan"): Plan {
  const parsed = PlanSchema.safeParse(data);
  if (!parsed.success) {
    throw new PlanInputError(`Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadPlan(path: string): Promise<Plan> {
  let data: unknown;
  try {
    data = await readJsonIfExists(path);
  } catch (err) {
    throw new PlanInputError(`Cannot read plan at ${path}: ${errorMessage(err)}`, { cause: err });
  }
  if (data === undefined) throw new PlanInputError(`Plan not found: ${path}`);
  return parsePlan(data, `plan at ${path}`);
}
