/**
 * Cleanup job report types
 */

export type CleanupJobName = "trash" | "tokens" | "audit-logs";

export interface CleanupOptions {
  dryRun?: boolean;
  now?: Date;
}

export interface CleanupItemFailure {
  id: string;
  label: string;
  error: string;
}

export interface CleanupReport<C = unknown> {
  job: CleanupJobName;
  dryRun: boolean;
  /** null for jobs without an age threshold */
  retentionDays: number | null;
  cutoff: Date | null;
  candidates: C[];
  /** Candidates handled, including failures; equals candidates.length on a dry run */
  processed: number;
  deleted: number;
  failed: number;
  errors: CleanupItemFailure[];
  success: boolean;
  durationMs: number;
}

export interface AuditLogStatistics {
  total: number;
  oldest: Date | null;
  newest: Date | null;
  /** Most frequent actions, at most ten, highest count first */
  topActions: { action: string; count: number }[];
}
