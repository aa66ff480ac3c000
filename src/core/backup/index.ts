/**
 * Backup module exports
 */

export {
  copyTree,
  createZipArchive,
  verifyDirectoryCopy,
  verifyZipArchive,
  type VerifiedZipOptions,
  writeVerifiedCopy,
  writeVerifiedZip,
  type ZipVerifier,
} from "./archive-creator";
export {
  type ArtifactCheck,
  checkArtifact,
  checkArtifacts,
  forgetMissingArtifacts,
} from "./artifact-check";
export {
  BACKUP_TARGETS,
  type BackupRunDeps,
  type BackupTarget,
  buildBackupSteps,
  isBackupTarget,
  runBackupTarget,
} from "./composite";
export { type DatabaseBackupDeps, runDatabaseBackup } from "./database-backup";
export { createFilesArtifact, type FileBackupDeps, runFilesBackup } from "./file-backup";
export { collectFiles } from "./file-collector";
