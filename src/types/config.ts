/**
 * Configuration type definitions for the GED maintenance toolkit
 */

import type { LogLevel } from "../utils/logger";

export interface GedDatabaseConfig {
  server: string;
  port: number;
  name: string;
  user: string;
  password: string;
  encrypt: boolean;
  trustServerCertificate: boolean;
  /** Timeout for BACKUP DATABASE / RESTORE VERIFYONLY, in seconds */
  backupTimeoutSeconds: number;
}

export interface StorageConfig {
  /** Directory where the application keeps uploaded documents */
  uploadDir: string;
}

export interface BackupSettings {
  /** Root directory; dumps go to `database/`, archives to `files/` */
  dir: string;
  databaseRetentionDays: number;
  filesRetentionDays: number;
  compressFileBackups: boolean;
  verifyBackups: boolean;
  /** zlib level used for file archives (0-9) */
  compressionLevel: number;
}

export interface CleanupSettings {
  trashRetentionDays: number;
  auditLogRetentionDays: number;
  auditLogArchiveDir: string;
  archiveAuditLogs: boolean;
  includeUsedTokens: boolean;
}

export interface SmtpConfig {
  host: string;
  port: number;
  useTls: boolean;
  username?: string;
  password?: string;
  sender: string;
}

export interface NotificationConfig {
  enabled: boolean;
  email: string;
  smtp: SmtpConfig;
}

export interface CatalogConfig {
  path: string;
}

export interface ScheduleConfig {
  cron: string;
  /** CLI arguments passed to ged-maintenance, e.g. "backup database" */
  command: string;
  description?: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface MaintenanceConfig {
  database: GedDatabaseConfig;
  storage: StorageConfig;
  backups: BackupSettings;
  cleanup: CleanupSettings;
  notifications: NotificationConfig;
  catalog: CatalogConfig;
  schedules: Record<string, ScheduleConfig>;
  logging: LoggingConfig;
}

/**
 * Recursive partial used by the config file, environment and inline layers
 */
export interface ConfigOverrides {
  database?: Partial<GedDatabaseConfig>;
  storage?: Partial<StorageConfig>;
  backups?: Partial<BackupSettings>;
  cleanup?: Partial<CleanupSettings>;
  notifications?: Partial<Omit<NotificationConfig, "smtp">> & { smtp?: Partial<SmtpConfig> };
  catalog?: Partial<CatalogConfig>;
  schedules?: Record<string, Partial<ScheduleConfig>>;
  logging?: Partial<LoggingConfig>;
}
