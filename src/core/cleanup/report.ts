/**
 * Cleanup report helpers
 */

import type { CleanupJobName, CleanupReport } from "../../types";

export function createReport<C>(
  job: CleanupJobName,
  dryRun: boolean,
  retentionDays: number | null,
  cutoff: Date | null,
  candidates: C[],
): CleanupReport<C> {
  return {
    job,
    dryRun,
    retentionDays,
    cutoff,
    candidates,
    processed: 0,
    deleted: 0,
    failed: 0,
    errors: [],
    success: true,
    durationMs: 0,
  };
}

export function recordFailure(
  report: CleanupReport,
  id: string,
  label: string,
  error: string,
): void {
  report.processed++;
  report.failed++;
  report.errors.push({ id, label, error });
}

export function recordDeletion(report: CleanupReport, count = 1): void {
  report.processed += count;
  report.deleted += count;
}

/**
 * Close the report: the job fails when any item failed
 */
export function finishReport<R extends CleanupReport>(report: R, startTime: number): R {
  report.success = report.failed === 0;
  report.durationMs = Date.now() - startTime;
  return report;
}
