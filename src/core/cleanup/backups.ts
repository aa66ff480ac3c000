/**
 * Retention pruning of backup artifacts
 */

import { getDatabaseBackupDir, getFilesBackupDir } from "../../config/resolver";
import { initCatalog, logDeletion, markArtifactDeleted } from "../../db";
import { LocalArtifactStorage, type StoredEntry } from "../../storage";
import type { ArtifactSource, MaintenanceConfig, PruneResult } from "../../types";
import { logger } from "../../utils/logger";
import { PARTIAL_SUFFIX, parseArtifactName } from "../../utils/naming";
import { errorMessage } from "../errors";
import { selectCandidates } from "./retention";
import { validatePruneCandidate } from "./validator";

export interface PruneOptions {
  dryRun?: boolean;
  now?: Date;
}

interface DatedEntry {
  entry: StoredEntry;
  createdAt: Date;
}

export function getRetentionDays(config: MaintenanceConfig, source: ArtifactSource): number {
  return source === "database"
    ? config.backups.databaseRetentionDays
    : config.backups.filesRetentionDays;
}

export function getArtifactStorage(
  config: MaintenanceConfig,
  source: ArtifactSource,
): LocalArtifactStorage {
  return new LocalArtifactStorage(
    source === "database" ? getDatabaseBackupDir(config) : getFilesBackupDir(config),
  );
}

/**
 * Delete artifacts of `source` older than its retention days. Names carry
 * the creation time; anything that does not parse is left alone.
 */
export async function pruneArtifacts(
  config: MaintenanceConfig,
  source: ArtifactSource,
  options: PruneOptions = {},
): Promise<PruneResult> {
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const retentionDays = getRetentionDays(config, source);
  const storage = getArtifactStorage(config, source);

  await initCatalog(config.catalog.path);

  const dated: DatedEntry[] = [];
  for (const entry of await storage.list()) {
    if (entry.name.endsWith(PARTIAL_SUFFIX)) continue;
    const parsed = parseArtifactName(
      entry.name,
      source === "database" ? config.database.name : undefined,
    );
    if (parsed && parsed.source === source) {
      dated.push({ entry, createdAt: parsed.createdAt });
    }
  }

  const candidates = selectCandidates(dated, now, retentionDays, (item) => item.createdAt);

  const result: PruneResult = {
    source,
    retentionDays,
    dryRun,
    candidates: candidates.map(({ entry }) => entry.name),
    deleted: [],
    failed: [],
  };

  logger.info(
    `Found ${candidates.length} ${source} backup(s) older than ${retentionDays} days in ${storage.rootDir}`,
  );

  for (const { entry } of candidates) {
    if (dryRun) {
      logger.info(`[DRY RUN] Would delete: ${entry.name}`);
      continue;
    }

    const validation = await validatePruneCandidate(entry, source, storage, config.database.name);
    if (!validation.valid) {
      const error = validation.errors.join("; ");
      logger.error(`Validation failed for ${entry.name}: ${error}`);
      result.failed.push({ name: entry.name, error });
      continue;
    }
    for (const warning of validation.warnings) {
      logger.debug(warning);
    }

    try {
      await storage.remove(entry.path);
      if (validation.record) {
        markArtifactDeleted(validation.record.artifact_id, now);
      }
      logDeletion({
        entity: "artifact",
        item_id: validation.record?.artifact_id ?? entry.name,
        item_label: entry.name,
        reason: "retention_days",
        success: true,
        error_message: null,
      });
      result.deleted.push(entry.name);
      logger.info(`Deleted old backup: ${entry.name}`);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to delete ${entry.name}: ${message}`);
      logDeletion({
        entity: "artifact",
        item_id: validation.record?.artifact_id ?? entry.name,
        item_label: entry.name,
        reason: "retention_days",
        success: false,
        error_message: message,
      });
      result.failed.push({ name: entry.name, error: message });
    }
  }

  return result;
}

/**
 * Best-effort retention pass run after a successful backup; returns the
 * number of artifacts removed
 */
export async function pruneAfterBackup(
  config: MaintenanceConfig,
  source: ArtifactSource,
  now: Date,
): Promise<number> {
  try {
    const pruned = await pruneArtifacts(config, source, { now });
    for (const failure of pruned.failed) {
      logger.warn(`Could not prune ${failure.name}: ${failure.error}`);
    }
    return pruned.deleted.length;
  } catch (error) {
    logger.warn(`Pruning old ${source} backups failed: ${errorMessage(error)}`);
    return 0;
  }
}
