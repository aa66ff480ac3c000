/**
 * Archival and deletion of old audit-log entries
 *
 * Entries are written to `audit_logs_archive_<ts>.json` and read back before
 * anything is deleted; the deletion runs in a single transaction.
 */

import { mkdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { initCatalog, logDeletion } from "../../db";
import type {
  AuditLogEntry,
  AuditLogStatistics,
  CleanupOptions,
  CleanupReport,
  GedRecordStore,
  MaintenanceConfig,
} from "../../types";
import { formatBytes, formatDate } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateAuditArchiveName } from "../../utils/naming";
import { CleanupError, errorMessage } from "../errors";
import { createReport, finishReport, recordDeletion } from "./report";
import { getCutoffDate, selectCandidates } from "./retention";

export interface AuditLogCleanupOptions extends CleanupOptions {
  /** Overrides cleanup.archiveAuditLogs */
  archive?: boolean;
}

export interface AuditLogCleanupReport extends CleanupReport<AuditLogEntry> {
  archivePath: string | null;
  statistics: AuditLogStatistics;
}

/** Archive record layout, one object per entry */
export interface ArchivedAuditLog {
  id: number;
  usuario_id: number | null;
  acao: string;
  tabela: string | null;
  registro_id: number | null;
  dados_json: string | null;
  ip_address: string | null;
  user_agent: string | null;
  data_hora: string;
}

export function toArchiveRecord(entry: AuditLogEntry): ArchivedAuditLog {
  return {
    id: entry.id,
    usuario_id: entry.userId,
    acao: entry.action,
    tabela: entry.table,
    registro_id: entry.recordId,
    dados_json: entry.dataJson,
    ip_address: entry.ipAddress,
    user_agent: entry.userAgent,
    data_hora: entry.timestamp.toISOString(),
  };
}

export function computeStatistics(entries: AuditLogEntry[]): AuditLogStatistics {
  if (entries.length === 0) {
    return { total: 0, oldest: null, newest: null, topActions: [] };
  }

  let oldest = entries[0]?.timestamp ?? null;
  let newest = oldest;
  const byAction = new Map<string, number>();

  for (const entry of entries) {
    if (oldest === null || entry.timestamp < oldest) oldest = entry.timestamp;
    if (newest === null || entry.timestamp > newest) newest = entry.timestamp;
    const action = entry.action || "unknown";
    byAction.set(action, (byAction.get(action) ?? 0) + 1);
  }

  const topActions = [...byAction.entries()]
    .map(([action, count]) => ({ action, count }))
    .sort((a, b) => b.count - a.count || a.action.localeCompare(b.action))
    .slice(0, 10);

  return { total: entries.length, oldest, newest, topActions };
}

function logStatistics(stats: AuditLogStatistics): void {
  logger.info(`Total logs: ${stats.total}`);
  if (stats.oldest && stats.newest) {
    logger.info(`Date range: ${formatDate(stats.oldest)} to ${formatDate(stats.newest)}`);
  }
  for (const { action, count } of stats.topActions) {
    logger.info(`  - ${action}: ${count}`);
  }
}

function readArchivedIds(content: string): number[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error("archive is not a JSON array");
  }
  return parsed.map((item: unknown, index) => {
    const id: unknown = typeof item === "object" && item !== null && "id" in item ? item.id : undefined;
    if (typeof id !== "number") {
      throw new Error(`archive entry ${index} has no numeric id`);
    }
    return id;
  });
}

/**
 * Write the archive and check that it lists exactly `entries`
 */
export async function writeAuditArchive(
  archiveDir: string,
  entries: AuditLogEntry[],
  now: Date,
): Promise<string> {
  await mkdir(archiveDir, { recursive: true });
  const archivePath = path.join(archiveDir, generateAuditArchiveName(now));

  try {
    await writeFile(archivePath, JSON.stringify(entries.map(toArchiveRecord), null, 2), "utf-8");

    const archivedIds = readArchivedIds(await readFile(archivePath, "utf-8"));
    const expected = new Set(entries.map((e) => e.id));
    const actual = new Set(archivedIds);
    if (
      archivedIds.length !== entries.length ||
      actual.size !== expected.size ||
      [...expected].some((id) => !actual.has(id))
    ) {
      throw new Error(`archive lists ${archivedIds.length} entries, expected ${entries.length}`);
    }
  } catch (error) {
    await rm(archivePath, { force: true });
    throw error;
  }

  return archivePath;
}

export async function runAuditLogCleanup(
  config: MaintenanceConfig,
  store: GedRecordStore,
  options: AuditLogCleanupOptions = {},
): Promise<AuditLogCleanupReport> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const archive = options.archive ?? config.cleanup.archiveAuditLogs;
  const retentionDays = config.cleanup.auditLogRetentionDays;
  const cutoff = getCutoffDate(now, retentionDays);

  logger.info(`Searching for audit logs older than ${retentionDays} days...`);

  let listed: AuditLogEntry[];
  try {
    listed = await store.listAuditLogsBefore(cutoff);
  } catch (error) {
    throw new CleanupError("select", `Cannot list audit logs: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const candidates = selectCandidates(listed, now, retentionDays, (entry) => entry.timestamp);
  const statistics = computeStatistics(candidates);
  const report: AuditLogCleanupReport = {
    ...createReport("audit-logs", dryRun, retentionDays, cutoff, candidates),
    archivePath: null,
    statistics,
  };

  if (candidates.length === 0) {
    logger.info("No old audit logs found");
    return finishReport(report, startTime);
  }

  logger.info(`Found ${candidates.length} old log(s)`);
  logStatistics(statistics);

  if (dryRun) {
    logger.info(
      `[DRY RUN] Would ${archive ? "archive and " : ""}delete ${candidates.length} log(s)`,
    );
    report.processed = candidates.length;
    return finishReport(report, startTime);
  }

  await initCatalog(config.catalog.path);

  if (archive) {
    try {
      report.archivePath = await writeAuditArchive(
        config.cleanup.auditLogArchiveDir,
        candidates,
        now,
      );
    } catch (error) {
      throw new CleanupError(
        "archive",
        `Archival failed, nothing deleted: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    const size = (await stat(report.archivePath)).size;
    logger.info(
      `Archived ${candidates.length} log(s) to ${report.archivePath} (${formatBytes(size)})`,
    );
  } else {
    logger.warn("Archive disabled - logs will be deleted without archiving");
  }

  let affected: number;
  try {
    affected = await store.deleteAuditLogs(candidates.map((entry) => entry.id));
  } catch (error) {
    if (report.archivePath) {
      await rm(report.archivePath, { force: true });
    }
    logDeletion({
      entity: "audit_log",
      item_id: `${candidates.length} entries`,
      item_label: `before ${cutoff.toISOString()}`,
      reason: "retention_days",
      success: false,
      error_message: errorMessage(error),
    });
    throw new CleanupError("delete", `Deleting audit logs failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (affected !== candidates.length) {
    logger.warn(`Deleted ${affected} log(s), expected ${candidates.length}`);
  }
  recordDeletion(report, affected);
  report.processed = candidates.length;
  logDeletion({
    entity: "audit_log",
    item_id: `${affected} entries`,
    item_label: report.archivePath
      ? path.basename(report.archivePath)
      : `before ${cutoff.toISOString()}`,
    reason: "retention_days",
    success: true,
    error_message: null,
  });
  logger.info(`Successfully deleted ${affected} log(s)`);

  return finishReport(report, startTime);
}
