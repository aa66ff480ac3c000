/**
 * Document storage backup job
 */

import * as fs from "node:fs";
import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { getFilesBackupDir } from "../../config/resolver";
import { initCatalog, insertArtifact } from "../../db";
import { directorySize } from "../../storage";
import type { ArchiveResult, BackupOptions, BackupResult, MaintenanceConfig } from "../../types";
import { computeFileChecksum, generateUUID } from "../../utils/crypto";
import { compressionRatio, formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateFilesBackupName } from "../../utils/naming";
import { pruneAfterBackup } from "../cleanup/backups";
import { BackupError, errorMessage } from "../errors";
import { writeVerifiedCopy, writeVerifiedZip, type ZipVerifier } from "./archive-creator";
import { collectFiles } from "./file-collector";

export interface FileBackupDeps {
  now?: () => Date;
  /** Reads the archive back before it is renamed; defaults to verifyZipArchive */
  verifyArchive?: ZipVerifier;
}

/**
 * Build the archive (or uncompressed copy) of the upload directory
 */
export async function createFilesArtifact(
  config: MaintenanceConfig,
  now: Date,
  deps: FileBackupDeps = {},
): Promise<ArchiveResult> {
  const uploadDir = config.storage.uploadDir;
  if (!fs.existsSync(uploadDir) || !fs.statSync(uploadDir).isDirectory()) {
    throw new BackupError("prepare", `Upload directory not found: ${uploadDir}`);
  }

  const { files, totalBytes } = await collectFiles(uploadDir);
  if (files.length === 0) {
    logger.warn(`Upload directory is empty: ${uploadDir}`);
  }
  logger.info(`Found ${files.length} files to back up (${formatBytes(totalBytes)})`);

  const compressed = config.backups.compressFileBackups;
  const backupDir = getFilesBackupDir(config);
  const archiveName = generateFilesBackupName(compressed, now);
  const archivePath = path.join(backupDir, archiveName);
  await mkdir(backupDir, { recursive: true });

  if (compressed) {
    let sizeBytes: number;
    try {
      sizeBytes = await writeVerifiedZip(files, archivePath, {
        compression: config.backups.compressionLevel,
        verify: config.backups.verifyBackups,
        verifier: deps.verifyArchive,
      });
    } catch (error) {
      if (error instanceof BackupError) throw error;
      throw new BackupError("archive", `Archive creation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    logger.info(
      `Archive created: ${archiveName} (${formatBytes(sizeBytes)}, ` +
        `${compressionRatio(totalBytes, sizeBytes).toFixed(1)}% smaller)`,
    );

    return {
      archiveName,
      archivePath,
      kind: "zip",
      sizeBytes,
      filesCount: files.length,
      sourceBytes: totalBytes,
      checksum: await computeFileChecksum(archivePath),
    };
  }

  try {
    await writeVerifiedCopy(files, archivePath, { verify: config.backups.verifyBackups });
  } catch (error) {
    if (error instanceof BackupError) throw error;
    throw new BackupError("copy", `Copying uploads failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const sizeBytes = await directorySize(archivePath);
  logger.info(`Uncompressed copy created: ${archiveName} (${formatBytes(sizeBytes)})`);

  return {
    archiveName,
    archivePath,
    kind: "directory",
    sizeBytes,
    filesCount: files.length,
    sourceBytes: totalBytes,
    checksum: null,
  };
}

export async function runFilesBackup(
  config: MaintenanceConfig,
  options: BackupOptions = {},
  deps: FileBackupDeps = {},
): Promise<BackupResult> {
  const startTime = Date.now();
  const now = deps.now?.() ?? new Date();
  const dryRun = options.dryRun ?? false;
  const compressed = config.backups.compressFileBackups;

  const artifactName = generateFilesBackupName(compressed, now);
  const artifactPath = path.join(getFilesBackupDir(config), artifactName);

  logger.info(`Starting file storage backup: ${config.storage.uploadDir}`);

  if (dryRun) {
    if (!fs.existsSync(config.storage.uploadDir)) {
      throw new BackupError("prepare", `Upload directory not found: ${config.storage.uploadDir}`);
    }
    const { files, totalBytes } = await collectFiles(config.storage.uploadDir);
    logger.info(
      `[DRY RUN] Would archive ${files.length} files (${formatBytes(totalBytes)}) to ${artifactPath}`,
    );
    return {
      source: "files",
      success: true,
      dryRun,
      artifactId: null,
      artifactName,
      artifactPath,
      kind: compressed ? "zip" : "directory",
      sizeBytes: null,
      filesCount: files.length,
      verification: config.backups.verifyBackups ? "verified" : "skipped",
      durationMs: Date.now() - startTime,
      pruned: 0,
    };
  }

  await initCatalog(config.catalog.path);

  const archive = await createFilesArtifact(config, now, deps);
  const verification = config.backups.verifyBackups ? "verified" : "skipped";

  const artifactId = generateUUID();
  insertArtifact({
    artifact_id: artifactId,
    source: "files",
    kind: archive.kind,
    artifact_name: archive.archiveName,
    artifact_path: archive.archivePath,
    size_bytes: archive.sizeBytes,
    checksum: archive.checksum,
    files_count: archive.filesCount,
    verification,
    created_at: now.toISOString(),
  });

  const pruned = await pruneAfterBackup(config, "files", now);
  const durationMs = Date.now() - startTime;
  logger.info(`File storage backup finished in ${formatDuration(durationMs)}`);

  return {
    source: "files",
    success: true,
    dryRun,
    artifactId,
    artifactName: archive.archiveName,
    artifactPath: archive.archivePath,
    kind: archive.kind,
    sizeBytes: archive.sizeBytes,
    filesCount: archive.filesCount,
    verification,
    durationMs,
    pruned,
  };
}
