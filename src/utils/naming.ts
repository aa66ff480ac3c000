/**
 * Artifact naming utilities
 *
 * Every artifact carries a local timestamp in its name:
 *   sistema_ged_backup_20240315_020000.bak     (database dump)
 *   files_backup_20240317_030000.zip           (file archive)
 *   files_backup_20240317_030000               (uncompressed copy)
 *   audit_logs_archive_20240318_040000.json    (audit log archive)
 */

import type { ArtifactKind, ArtifactSource } from "../types";

export const FILES_PREFIX = "files_backup";
export const AUDIT_ARCHIVE_PREFIX = "audit_logs_archive";
export const PARTIAL_SUFFIX = ".partial";

const TIMESTAMP_PATTERN = "(\\d{8})_(\\d{6})";

export interface ParsedArtifactName {
  source: ArtifactSource;
  kind: ArtifactKind;
  /** Database name for dumps, "files" for file backups */
  subject: string;
  timestamp: string;
  createdAt: Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as `YYYYMMDD_HHMMSS`
 */
export function formatArtifactTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function parseArtifactTimestamp(timestamp: string): Date | null {
  const match = timestamp.match(/^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/);
  if (!match) return null;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  return Number.isNaN(date.getTime()) || date.getMonth() !== month - 1 ? null : date;
}

export function generateDatabaseBackupName(databaseName: string, date: Date = new Date()): string {
  return `${databaseName}_backup_${formatArtifactTimestamp(date)}.bak`;
}

export function generateFilesBackupName(compressed: boolean, date: Date = new Date()): string {
  const base = `${FILES_PREFIX}_${formatArtifactTimestamp(date)}`;
  return compressed ? `${base}.zip` : base;
}

export function generateAuditArchiveName(date: Date = new Date()): string {
  return `${AUDIT_ARCHIVE_PREFIX}_${formatArtifactTimestamp(date)}.json`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parse an artifact name produced by this toolkit. Database dumps are only
 * recognised for `databaseName` when it is given.
 */
export function parseArtifactName(name: string, databaseName?: string): ParsedArtifactName | null {
  const dbSubject = databaseName ? escapeRegExp(databaseName) : ".+";
  const dbMatch = name.match(new RegExp(`^(${dbSubject})_backup_${TIMESTAMP_PATTERN}\\.bak$`));
  if (dbMatch?.[1] && dbMatch[2] && dbMatch[3]) {
    return buildParsed("database", "bak", dbMatch[1], `${dbMatch[2]}_${dbMatch[3]}`);
  }

  const filesMatch = name.match(new RegExp(`^${FILES_PREFIX}_${TIMESTAMP_PATTERN}(\\.zip)?$`));
  if (filesMatch?.[1] && filesMatch[2]) {
    const kind: ArtifactKind = filesMatch[3] ? "zip" : "directory";
    return buildParsed("files", kind, "files", `${filesMatch[1]}_${filesMatch[2]}`);
  }

  return null;
}

function buildParsed(
  source: ArtifactSource,
  kind: ArtifactKind,
  subject: string,
  timestamp: string,
): ParsedArtifactName | null {
  const createdAt = parseArtifactTimestamp(timestamp);
  if (!createdAt) return null;
  return { source, kind, subject, timestamp, createdAt };
}

export function isValidArtifactName(name: string, source: ArtifactSource, databaseName?: string): boolean {
  const parsed = parseArtifactName(name, databaseName);
  return parsed !== null && parsed.source === source;
}

export function toPartialPath(finalPath: string): string {
  return `${finalPath}${PARTIAL_SUFFIX}`;
}
