/**
 * Removal of expired and used password-reset tokens
 */

import { initCatalog, logDeletion } from "../../db";
import type {
  CleanupOptions,
  CleanupReport,
  GedRecordStore,
  MaintenanceConfig,
  ResetToken,
} from "../../types";
import { formatDateTime } from "../../utils/format";
import { logger } from "../../utils/logger";
import { CleanupError, errorMessage } from "../errors";
import { createReport, finishReport, recordDeletion, recordFailure } from "./report";

export interface TokenCleanupOptions extends CleanupOptions {
  /** Overrides cleanup.includeUsedTokens */
  includeUsed?: boolean;
}

export function isTokenCandidate(token: ResetToken, now: Date, includeUsed: boolean): boolean {
  return token.expiresAt.getTime() < now.getTime() || (includeUsed && token.used);
}

export function describeTokenStatus(token: ResetToken, now: Date): string {
  const parts: string[] = [];
  if (token.expiresAt.getTime() < now.getTime()) parts.push("expired");
  if (token.used) parts.push("used");
  return parts.join(" & ");
}

export async function runTokenCleanup(
  config: MaintenanceConfig,
  store: GedRecordStore,
  options: TokenCleanupOptions = {},
): Promise<CleanupReport<ResetToken>> {
  const startTime = Date.now();
  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const includeUsed = options.includeUsed ?? config.cleanup.includeUsedTokens;

  logger.info("Searching for expired password reset tokens...");

  let listed: ResetToken[];
  try {
    listed = await store.listResetTokens(now, includeUsed);
  } catch (error) {
    throw new CleanupError("select", `Cannot list reset tokens: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const candidates = listed.filter((token) => isTokenCandidate(token, now, includeUsed));
  const report = createReport("tokens", dryRun, null, null, candidates);

  if (candidates.length === 0) {
    logger.info("No expired or used tokens found");
    return finishReport(report, startTime);
  }

  const expired = candidates.filter((t) => t.expiresAt.getTime() < now.getTime()).length;
  logger.info(
    `Found ${candidates.length} token(s) to delete ` +
      `(expired: ${expired}, used only: ${candidates.length - expired})`,
  );

  if (!dryRun) {
    await initCatalog(config.catalog.path);
  }

  for (const token of candidates) {
    const status = describeTokenStatus(token, now);
    const label = `${token.token.slice(0, 8)}... (user ${token.userId})`;
    logger.info(
      `Token ${label}: created ${formatDateTime(token.createdAt)}, ` +
        `expires ${formatDateTime(token.expiresAt)}, ${status}`,
    );

    if (dryRun) {
      logger.info(`[DRY RUN] Would delete token ${token.id}`);
      report.processed++;
      continue;
    }

    const reason = token.expiresAt.getTime() < now.getTime() ? "expired" : "used";
    try {
      await store.deleteResetToken(token.id);
      recordDeletion(report);
      logDeletion({
        entity: "token",
        item_id: String(token.id),
        item_label: label,
        reason,
        success: true,
        error_message: null,
      });
    } catch (error) {
      const message = errorMessage(error);
      recordFailure(report, String(token.id), label, message);
      logDeletion({
        entity: "token",
        item_id: String(token.id),
        item_label: label,
        reason,
        success: false,
        error_message: message,
      });
      logger.error(`Failed to delete token ${token.id}: ${message}`);
    }
  }

  logger.info(`Deleted ${report.deleted} of ${candidates.length} token(s)`);
  return finishReport(report, startTime);
}
