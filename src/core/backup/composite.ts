/**
 * Backup targets: database, files, or both in that order
 */

import { createNotifier, type Notifier, sendBackupReport } from "../../notifications";
import type { BackupOptions, BackupResult, CompositeResult, MaintenanceConfig } from "../../types";
import { type CompositeStep, runComposite } from "../composite";
import { type DatabaseBackupDeps, runDatabaseBackup } from "./database-backup";
import { type FileBackupDeps, runFilesBackup } from "./file-backup";

export const BACKUP_TARGETS = ["database", "files", "all"] as const;
export type BackupTarget = (typeof BACKUP_TARGETS)[number];

export function isBackupTarget(value: string): value is BackupTarget {
  return (BACKUP_TARGETS as readonly string[]).includes(value);
}

export interface BackupRunDeps extends DatabaseBackupDeps, FileBackupDeps {
  /** null disables notifications regardless of configuration */
  notifier?: Notifier | null;
}

export function buildBackupSteps(
  config: MaintenanceConfig,
  target: BackupTarget,
  options: BackupOptions,
  deps: BackupRunDeps,
): CompositeStep<BackupResult>[] {
  const steps: CompositeStep<BackupResult>[] = [];
  if (target === "database" || target === "all") {
    steps.push({ name: "database", run: () => runDatabaseBackup(config, options, deps) });
  }
  if (target === "files" || target === "all") {
    steps.push({ name: "files", run: () => runFilesBackup(config, options, deps) });
  }
  return steps;
}

/**
 * Run the target's backups, then send the summary e-mail when configured.
 * Dry runs never notify.
 */
export async function runBackupTarget(
  config: MaintenanceConfig,
  target: BackupTarget,
  options: BackupOptions = {},
  deps: BackupRunDeps = {},
): Promise<CompositeResult<BackupResult>> {
  const result = await runComposite(
    buildBackupSteps(config, target, options, deps),
    (r) => r.success,
  );

  const notifier = deps.notifier === undefined ? createNotifier(config) : deps.notifier;
  if (notifier && !options.dryRun) {
    await sendBackupReport(notifier, config.database.name, result);
  }

  return result;
}
