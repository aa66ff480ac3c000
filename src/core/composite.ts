/**
 * Sequential composite jobs
 */

import type { CompositeJobOutcome, CompositeResult } from "../types";
import { logger } from "../utils/logger";
import { errorMessage } from "./errors";

export interface CompositeStep<R> {
  name: string;
  run: () => Promise<R>;
}

/**
 * Run the steps in order. A step that throws, or whose result `succeeded`
 * rejects, is recorded as failed and the remaining steps still run.
 */
export async function runComposite<R>(
  steps: CompositeStep<R>[],
  succeeded: (result: R) => boolean,
): Promise<CompositeResult<R>> {
  const startTime = Date.now();
  const outcomes: CompositeJobOutcome<R>[] = [];

  for (const step of steps) {
    logger.info(`Running ${step.name}...`);
    try {
      const result = await step.run();
      const success = succeeded(result);
      outcomes.push({ job: step.name, success, result });
      if (!success) {
        logger.error(`${step.name} finished with failures`);
      }
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`${step.name} failed: ${message}`);
      outcomes.push({ job: step.name, success: false, result: null, error: message });
    }
  }

  const failedJobs = outcomes.filter((o) => !o.success).map((o) => o.job);

  return {
    success: failedJobs.length === 0,
    outcomes,
    failedJobs,
    durationMs: Date.now() - startTime,
  };
}
