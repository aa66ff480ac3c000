/**
 * Cleanup module exports
 */

export {
  type ArchivedAuditLog,
  type AuditLogCleanupOptions,
  type AuditLogCleanupReport,
  computeStatistics,
  runAuditLogCleanup,
  toArchiveRecord,
  writeAuditArchive,
} from "./audit-logs";
export {
  getArtifactStorage,
  getRetentionDays,
  pruneAfterBackup,
  pruneArtifacts,
  type PruneOptions,
} from "./backups";
export {
  CLEANUP_TARGETS,
  type CleanupRunDeps,
  type CleanupRunOptions,
  type CleanupStepResult,
  type CleanupTarget,
  isCleanupTarget,
  runCleanupTarget,
  stepSucceeded,
} from "./composite";
export { createReport, finishReport, recordDeletion, recordFailure } from "./report";
export { DAY_MS, daysBetween, getCutoffDate, isOlderThan, selectCandidates } from "./retention";
export {
  describeTokenStatus,
  isTokenCandidate,
  runTokenCleanup,
  type TokenCleanupOptions,
} from "./tokens";
export { deleteDocumentFiles, deleteStoredFile, runTrashCleanup } from "./trash";
export { type ValidationResult, validatePruneCandidate } from "./validator";
