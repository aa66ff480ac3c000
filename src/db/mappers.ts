/**
 * Catalog row mapping utilities
 */

import type { DeletionLogRecord } from "../types";

export type RawDeletionLogRow = Omit<DeletionLogRecord, "success"> & {
  success: number;
};

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return {
    ...row,
    success: row.success === 1,
  };
}

export function serializeBoolean(value: boolean): number {
  return value ? 1 : 0;
}
