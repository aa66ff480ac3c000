/**
 * Deletion log repository
 */

import type { DeletionLogRecord } from "../types";
import { getCatalog } from "./connection";
import { parseDeletionLogRow, type RawDeletionLogRow, serializeBoolean } from "./mappers";

export type DeletionLogInsert = Omit<DeletionLogRecord, "id" | "deleted_at"> & {
  deleted_at?: string;
};

export function logDeletion(log: DeletionLogInsert): void {
  getCatalog()
    .prepare(
      `INSERT INTO deletion_log (
        entity, item_id, item_label, reason, deleted_at, success, error_message
      ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
    )
    .run(
      log.entity,
      log.item_id,
      log.item_label,
      log.reason,
      log.deleted_at ?? new Date().toISOString(),
      serializeBoolean(log.success),
      log.error_message ?? null,
    );
}

export function getDeletionLogs(limit = 100): DeletionLogRecord[] {
  return getCatalog()
    .prepare<[number], RawDeletionLogRow>(
      "SELECT * FROM deletion_log ORDER BY deleted_at DESC, id DESC LIMIT ?",
    )
    .all(limit)
    .map(parseDeletionLogRow);
}
