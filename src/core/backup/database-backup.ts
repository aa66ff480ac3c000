/**
 * Database backup job: native dump, verification, catalog record, pruning
 */

import { mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import { getDatabaseBackupDir } from "../../config/resolver";
import { initCatalog, insertArtifact, markArtifactDeleted } from "../../db";
import { NativeBackupDumper } from "../../ged";
import { getFileSize } from "../../storage";
import type {
  BackupOptions,
  BackupResult,
  DatabaseDumper,
  MaintenanceConfig,
  VerificationStatus,
} from "../../types";
import { computeFileChecksum, generateUUID } from "../../utils/crypto";
import { formatBytes, formatDateTime, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateDatabaseBackupName } from "../../utils/naming";
import { pruneAfterBackup } from "../cleanup/backups";
import { BackupError, errorMessage, VerificationError } from "../errors";

export interface DatabaseBackupDeps {
  openDumper?: (config: MaintenanceConfig) => Promise<DatabaseDumper>;
  now?: () => Date;
}

async function removeArtifact(artifactPath: string): Promise<void> {
  try {
    await rm(artifactPath, { force: true });
  } catch (error) {
    logger.warn(`Could not remove ${artifactPath}: ${errorMessage(error)}`);
  }
}

export async function runDatabaseBackup(
  config: MaintenanceConfig,
  options: BackupOptions = {},
  deps: DatabaseBackupDeps = {},
): Promise<BackupResult> {
  const startTime = Date.now();
  const now = deps.now?.() ?? new Date();
  const dryRun = options.dryRun ?? false;
  const databaseName = config.database.name;

  const backupDir = getDatabaseBackupDir(config);
  const artifactName = generateDatabaseBackupName(databaseName, now);
  const artifactPath = path.join(backupDir, artifactName);

  logger.info(`Starting database backup: ${databaseName} -> ${artifactPath}`);

  const result: BackupResult = {
    source: "database",
    success: false,
    dryRun,
    artifactId: null,
    artifactName,
    artifactPath,
    kind: "bak",
    sizeBytes: null,
    filesCount: 0,
    verification: config.backups.verifyBackups ? "verified" : "skipped",
    durationMs: 0,
    pruned: 0,
  };

  if (dryRun) {
    logger.info(
      `[DRY RUN] Would back up database ${databaseName} from ${config.database.server} to ${artifactPath}`,
    );
    result.success = true;
    result.durationMs = Date.now() - startTime;
    return result;
  }

  try {
    await mkdir(backupDir, { recursive: true });
  } catch (error) {
    throw new BackupError("prepare", `Cannot create ${backupDir}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  await initCatalog(config.catalog.path);

  const openDumper = deps.openDumper ?? ((c) => NativeBackupDumper.connect(c.database));
  let dumper: DatabaseDumper;
  try {
    dumper = await openDumper(config);
  } catch (error) {
    throw new BackupError("prepare", `Cannot connect to SQL Server: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  try {
    try {
      await dumper.dump(artifactPath, `${databaseName} Full Backup ${formatDateTime(now)}`);
    } catch (error) {
      await removeArtifact(artifactPath);
      throw new BackupError("dump", `Database backup failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const sizeBytes = await getFileSize(artifactPath);
    if (sizeBytes === null) {
      logger.warn(`Backup file is not visible from this host: ${artifactPath}`);
    }

    let verification: VerificationStatus = "skipped";
    if (config.backups.verifyBackups) {
      logger.info("Verifying database backup...");
      try {
        await dumper.verify(artifactPath);
        verification = "verified";
      } catch (error) {
        await removeArtifact(artifactPath);
        recordFailedArtifact(config, artifactName, artifactPath, sizeBytes, now);
        throw new VerificationError(`Backup verification failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    const artifactId = generateUUID();
    insertArtifact({
      artifact_id: artifactId,
      source: "database",
      kind: "bak",
      artifact_name: artifactName,
      artifact_path: artifactPath,
      size_bytes: sizeBytes,
      checksum: sizeBytes === null ? null : await computeFileChecksum(artifactPath),
      files_count: 0,
      verification,
      created_at: now.toISOString(),
    });

    result.success = true;
    result.artifactId = artifactId;
    result.sizeBytes = sizeBytes;
    result.verification = verification;
  } finally {
    await dumper.close();
  }

  const sizeLabel = result.sizeBytes === null ? "size unknown" : formatBytes(result.sizeBytes);
  logger.info(`Database backup completed: ${artifactName} (${sizeLabel})`);

  result.pruned = await pruneAfterBackup(config, "database", now);
  result.durationMs = Date.now() - startTime;
  logger.info(`Database backup finished in ${formatDuration(result.durationMs)}`);

  return result;
}

function recordFailedArtifact(
  config: MaintenanceConfig,
  artifactName: string,
  artifactPath: string,
  sizeBytes: number | null,
  now: Date,
): void {
  const artifactId = generateUUID();
  insertArtifact({
    artifact_id: artifactId,
    source: "database",
    kind: "bak",
    artifact_name: artifactName,
    artifact_path: artifactPath,
    size_bytes: sizeBytes,
    checksum: null,
    files_count: 0,
    verification: "failed",
    created_at: now.toISOString(),
  });
  markArtifactDeleted(artifactId, now);
  logger.debug(`Recorded failed artifact ${artifactId} for ${config.database.name}`);
}
