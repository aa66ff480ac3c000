/**
 * Core module exports
 */

// Backup
export {
  type ArtifactCheck,
  BACKUP_TARGETS,
  type BackupRunDeps,
  type BackupTarget,
  checkArtifacts,
  collectFiles,
  forgetMissingArtifacts,
  isBackupTarget,
  runBackupTarget,
  runDatabaseBackup,
  runFilesBackup,
} from "./backup";

// Cleanup
export {
  CLEANUP_TARGETS,
  type CleanupRunDeps,
  type CleanupRunOptions,
  type CleanupStepResult,
  type CleanupTarget,
  isCleanupTarget,
  pruneArtifacts,
  runAuditLogCleanup,
  runCleanupTarget,
  runTokenCleanup,
  runTrashCleanup,
  selectCandidates,
} from "./cleanup";

// Composite
export { type CompositeStep, runComposite } from "./composite";

// Errors
export { BackupError, CleanupError, errorMessage, VerificationError } from "./errors";

// Scheduler
export {
  buildScheduleEntries,
  getNextRun,
  parseCron,
  type ScheduleEntry,
  type SchedulePlatform,
} from "./scheduler";
