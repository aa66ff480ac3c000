/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { MaintenanceConfig } from "../types";
import { resolveFrom } from "../utils/path";

export const DATABASE_BACKUP_SUBDIR = "database";
export const FILES_BACKUP_SUBDIR = "files";

/**
 * Resolve relative paths against `baseDir` and derive the audit archive
 * directory and catalog path from the backup directory when unset.
 */
export function resolvePaths(config: MaintenanceConfig, baseDir: string): MaintenanceConfig {
  const backupDir = resolveFrom(baseDir, config.backups.dir);

  return {
    ...config,
    storage: { ...config.storage, uploadDir: resolveFrom(baseDir, config.storage.uploadDir) },
    backups: { ...config.backups, dir: backupDir },
    cleanup: {
      ...config.cleanup,
      auditLogArchiveDir: config.cleanup.auditLogArchiveDir
        ? resolveFrom(baseDir, config.cleanup.auditLogArchiveDir)
        : path.join(backupDir, "audit_logs"),
    },
    catalog: {
      path: config.catalog.path
        ? resolveFrom(baseDir, config.catalog.path)
        : path.join(backupDir, "catalog.db"),
    },
  };
}

export function getDatabaseBackupDir(config: MaintenanceConfig): string {
  return path.join(config.backups.dir, DATABASE_BACKUP_SUBDIR);
}

export function getFilesBackupDir(config: MaintenanceConfig): string {
  return path.join(config.backups.dir, FILES_BACKUP_SUBDIR);
}
