/**
 * Inline configuration parsing and merging utilities
 */

import type { ConfigOverrides } from "../types";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Backup root directory */
  backupDir?: string;
  /** Document upload directory */
  uploadDir?: string;
  /** Artifact catalog file path */
  catalog?: string;

  databaseRetentionDays?: number;
  filesRetentionDays?: number;
  trashRetentionDays?: number;
  auditLogRetentionDays?: number;

  /** Copy the upload tree instead of zipping it */
  noCompress?: boolean;
  /** Skip RESTORE VERIFYONLY and archive checks */
  noVerify?: boolean;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "backup-dir": { type: "string" as const },
  "upload-dir": { type: "string" as const },
  catalog: { type: "string" as const },

  "database-retention-days": { type: "string" as const },
  "files-retention-days": { type: "string" as const },
  "trash-retention-days": { type: "string" as const },
  "audit-log-retention-days": { type: "string" as const },

  "no-compress": { type: "boolean" as const, default: false },
  "no-verify": { type: "boolean" as const, default: false },
} as const;

/**
 * Parsed values of INLINE_CONFIG_OPTIONS
 */
export interface InlineFlagValues {
  "backup-dir"?: string;
  "upload-dir"?: string;
  catalog?: string;
  "database-retention-days"?: string;
  "files-retention-days"?: string;
  "trash-retention-days"?: string;
  "audit-log-retention-days"?: string;
  "no-compress"?: boolean;
  "no-verify"?: boolean;
}

function parseDays(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const days = Number(value);
  if (!Number.isInteger(days) || days < 1) {
    throw new ConfigError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return days;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineFlagValues): InlineConfigOptions {
  return {
    backupDir: values["backup-dir"],
    uploadDir: values["upload-dir"],
    catalog: values.catalog,

    databaseRetentionDays: parseDays(values["database-retention-days"], "database-retention-days"),
    filesRetentionDays: parseDays(values["files-retention-days"], "files-retention-days"),
    trashRetentionDays: parseDays(values["trash-retention-days"], "trash-retention-days"),
    auditLogRetentionDays: parseDays(
      values["audit-log-retention-days"],
      "audit-log-retention-days",
    ),

    noCompress: values["no-compress"],
    noVerify: values["no-verify"],
  };
}

/**
 * Build a config layer from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): ConfigOverrides {
  return {
    storage: { uploadDir: options.uploadDir },
    backups: {
      dir: options.backupDir,
      databaseRetentionDays: options.databaseRetentionDays,
      filesRetentionDays: options.filesRetentionDays,
      ...(options.noCompress && { compressFileBackups: false }),
      ...(options.noVerify && { verifyBackups: false }),
    },
    cleanup: {
      trashRetentionDays: options.trashRetentionDays,
      auditLogRetentionDays: options.auditLogRetentionDays,
    },
    catalog: { path: options.catalog },
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined && value !== false);
}
