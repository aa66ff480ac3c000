/**
 * Centralized type exports
 */

// Artifact and job types
export type {
  ArchiveResult,
  ArtifactKind,
  ArtifactSource,
  BackupOptions,
  BackupResult,
  CollectedFile,
  CollectFilesResult,
  CompositeJobOutcome,
  CompositeResult,
  PruneResult,
  VerificationStatus,
} from "./artifact";
// Catalog types
export type {
  ArtifactInsert,
  ArtifactRecord,
  ArtifactStatus,
  DeletedEntity,
  DeletionLogRecord,
  DeletionReason,
  Migration,
} from "./catalog";
// Config types
export type {
  BackupSettings,
  CatalogConfig,
  CleanupSettings,
  ConfigOverrides,
  GedDatabaseConfig,
  LoggingConfig,
  MaintenanceConfig,
  NotificationConfig,
  ScheduleConfig,
  SmtpConfig,
  StorageConfig,
} from "./config";
// Application database types
export type {
  AuditLogEntry,
  DatabaseDumper,
  GedRecordStore,
  ResetToken,
  TrashedDocument,
} from "./ged";
// Cleanup types
export type {
  AuditLogStatistics,
  CleanupItemFailure,
  CleanupJobName,
  CleanupOptions,
  CleanupReport,
} from "./cleanup";
