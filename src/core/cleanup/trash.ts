/**
 * Permanent deletion of documents left in the trash past their retention
 */

import { unlink } from "node:fs/promises";
import { initCatalog, logDeletion } from "../../db";
import type {
  CleanupOptions,
  CleanupReport,
  GedRecordStore,
  MaintenanceConfig,
  TrashedDocument,
} from "../../types";
import { formatBytes, formatDateTime } from "../../utils/format";
import { logger } from "../../utils/logger";
import { resolveWithin } from "../../utils/path";
import { CleanupError, errorMessage } from "../errors";
import { createReport, finishReport, recordDeletion, recordFailure } from "./report";
import { daysBetween, getCutoffDate, selectCandidates } from "./retention";

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Delete one stored file. A missing file only warns; anything else throws.
 */
export async function deleteStoredFile(uploadDir: string, storedPath: string): Promise<boolean> {
  const absolutePath = resolveWithin(uploadDir, storedPath);
  if (!absolutePath) {
    throw new Error(`Path "${storedPath}" is outside the upload directory - REFUSING TO DELETE`);
  }

  try {
    await unlink(absolutePath);
    logger.debug(`Deleted file: ${absolutePath}`);
    return true;
  } catch (error) {
    if (hasCode(error, "ENOENT")) {
      logger.warn(`File not found: ${absolutePath}`);
      return false;
    }
    throw error;
  }
}

export async function deleteDocumentFiles(uploadDir: string, doc: TrashedDocument): Promise<number> {
  const paths = [doc.filePath, ...doc.versionPaths].filter(
    (p): p is string => p !== null && p.trim() !== "",
  );
  let removed = 0;
  for (const storedPath of new Set(paths)) {
    if (await deleteStoredFile(uploadDir, storedPath)) {
      removed++;
    }
  }
  return removed;
}

export async function runTrashCleanup(
  config: MaintenanceConfig,
  store: GedRecordStore,
  options: CleanupOptions = {},
): Promise<CleanupReport<TrashedDocument>> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const retentionDays = config.cleanup.trashRetentionDays;
  const cutoff = getCutoffDate(now, retentionDays);

  logger.info(`Searching for documents in trash older than ${retentionDays} days...`);

  let listed: TrashedDocument[];
  try {
    listed = await store.listTrashedDocuments(cutoff);
  } catch (error) {
    throw new CleanupError("select", `Cannot list trashed documents: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const candidates = selectCandidates(listed, now, retentionDays, (doc) => doc.deletedAt);
  const report = createReport("trash", dryRun, retentionDays, cutoff, candidates);

  if (candidates.length === 0) {
    logger.info("No expired documents found in trash");
    return finishReport(report, startTime);
  }

  logger.info(`Found ${candidates.length} expired document(s) to delete`);

  if (!dryRun) {
    await initCatalog(config.catalog.path);
  }

  for (const doc of candidates) {
    logger.info(
      `Document: ${doc.name} (id ${doc.id}, deleted ${formatDateTime(doc.deletedAt)}, ` +
        `${daysBetween(doc.deletedAt, now)} days in trash, ${formatBytes(doc.sizeBytes)})`,
    );

    if (dryRun) {
      logger.info(`[DRY RUN] Would permanently delete document ${doc.id}`);
      report.processed++;
      continue;
    }

    try {
      await deleteDocumentFiles(config.storage.uploadDir, doc);
      await store.deleteDocument(doc.id);
      recordDeletion(report);
      logDeletion({
        entity: "trash",
        item_id: String(doc.id),
        item_label: doc.name,
        reason: "retention_days",
        success: true,
        error_message: null,
      });
      logger.info(`Permanently deleted document ${doc.id}`);
    } catch (error) {
      const message = errorMessage(error);
      recordFailure(report, String(doc.id), doc.name, message);
      logDeletion({
        entity: "trash",
        item_id: String(doc.id),
        item_label: doc.name,
        reason: "retention_days",
        success: false,
        error_message: message,
      });
      logger.error(`Failed to delete document ${doc.id}: ${message}`);
    }
  }

  return finishReport(report, startTime);
}
