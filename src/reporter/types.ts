import type { JobResult, JobTransition, Report } from "../../contracts/types.js";

export interface Reporter {
  /** Called on every job state change */
  jobTransition(transition: JobTransition): void;
  /** Called once per job with its final result */
  jobComplete(result: JobResult): void;
  /** Called when the full run completes */
  runComplete(report: Report): void;
}

/** Fan events out to several reporters in order */
export function combineReporters(...reporters: Reporter[]): Reporter {
  return {
    jobTransition(t) {
      for (const r of reporters) r.jobTransition(t);
    },
    jobComplete(result) {
      for (const r of reporters) r.jobComplete(result);
    },
    runComplete(report) {
      for (const r of reporters) r.runComplete(report);
    },
  };
}
