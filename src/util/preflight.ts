import { randomBytes } from "node:crypto";
import { stat } from "node:fs/promises";
import { PlanInputError } from "../errors.js";
import { errnoCode } from "./fs.js";

/** Generate an 8-char hex run ID */
export function generateRunId(): string {
  return randomBytes(4).toString("hex");
}

/** Validate that a path exists and is a directory */
export async function validateDirectory(dir: string, label: string): Promise<void> {
  try {
    const s = await stat(dir);
    if (!s.isDirectory()) {
      throw new PlanInputError(`${label} ${dir} is not a directory`);
    }
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new PlanInputError(`${label} ${dir} does not exist`);
    }
    throw err;
  }
}
