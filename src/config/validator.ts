/**
 * Configuration validation
 */

import { CronExpressionParser } from "cron-parser";
import type { ConfigOverrides, MaintenanceConfig, ScheduleConfig } from "../types";
import { isLogLevel } from "../utils/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(raw: Section, name: string): Section | undefined {
  const value = raw[name];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`${name} must be an object`);
  }
  return value;
}

function readString(section: Section, key: string, label: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${label}.${key} must be a string`);
  }
  return value;
}

function readNumber(section: Section, key: string, label: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ConfigError(`${label}.${key} must be a number`);
  }
  return value;
}

function readBoolean(section: Section, key: string, label: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`${label}.${key} must be a boolean`);
  }
  return value;
}

/**
 * Parse the contents of a config file into an override layer
 */
export function parseConfigOverrides(raw: unknown): ConfigOverrides {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be an object");
  }

  const overrides: ConfigOverrides = {};

  const database = readSection(raw, "database");
  if (database) {
    overrides.database = {
      server: readString(database, "server", "database"),
      port: readNumber(database, "port", "database"),
      name: readString(database, "name", "database"),
      user: readString(database, "user", "database"),
      password: readString(database, "password", "database"),
      encrypt: readBoolean(database, "encrypt", "database"),
      trustServerCertificate: readBoolean(database, "trustServerCertificate", "database"),
      backupTimeoutSeconds: readNumber(database, "backupTimeoutSeconds", "database"),
    };
  }

  const storage = readSection(raw, "storage");
  if (storage) {
    overrides.storage = { uploadDir: readString(storage, "uploadDir", "storage") };
  }

  const backups = readSection(raw, "backups");
  if (backups) {
    overrides.backups = {
      dir: readString(backups, "dir", "backups"),
      databaseRetentionDays: readNumber(backups, "databaseRetentionDays", "backups"),
      filesRetentionDays: readNumber(backups, "filesRetentionDays", "backups"),
      compressFileBackups: readBoolean(backups, "compressFileBackups", "backups"),
      verifyBackups: readBoolean(backups, "verifyBackups", "backups"),
      compressionLevel: readNumber(backups, "compressionLevel", "backups"),
    };
  }

  const cleanup = readSection(raw, "cleanup");
  if (cleanup) {
    overrides.cleanup = {
      trashRetentionDays: readNumber(cleanup, "trashRetentionDays", "cleanup"),
      auditLogRetentionDays: readNumber(cleanup, "auditLogRetentionDays", "cleanup"),
      auditLogArchiveDir: readString(cleanup, "auditLogArchiveDir", "cleanup"),
      archiveAuditLogs: readBoolean(cleanup, "archiveAuditLogs", "cleanup"),
      includeUsedTokens: readBoolean(cleanup, "includeUsedTokens", "cleanup"),
    };
  }

  const notifications = readSection(raw, "notifications");
  if (notifications) {
    const smtp = readSection(notifications, "smtp");
    overrides.notifications = {
      enabled: readBoolean(notifications, "enabled", "notifications"),
      email: readString(notifications, "email", "notifications"),
      smtp: smtp
        ? {
            host: readString(smtp, "host", "notifications.smtp"),
            port: readNumber(smtp, "port", "notifications.smtp"),
            useTls: readBoolean(smtp, "useTls", "notifications.smtp"),
            username: readString(smtp, "username", "notifications.smtp"),
            password: readString(smtp, "password", "notifications.smtp"),
            sender: readString(smtp, "sender", "notifications.smtp"),
          }
        : undefined,
    };
  }

  const catalog = readSection(raw, "catalog");
  if (catalog) {
    overrides.catalog = { path: readString(catalog, "path", "catalog") };
  }

  const schedules = readSection(raw, "schedules");
  if (schedules) {
    const parsed: NonNullable<ConfigOverrides["schedules"]> = {};
    for (const [name, schedule] of Object.entries(schedules)) {
      if (!isRecord(schedule)) {
        throw new ConfigError(`schedules.${name} must be an object`);
      }
      const label = `schedules.${name}`;
      parsed[name] = {
        cron: readString(schedule, "cron", label),
        command: readString(schedule, "command", label),
        description: readString(schedule, "description", label),
      };
    }
    overrides.schedules = parsed;
  }

  const logging = readSection(raw, "logging");
  if (logging) {
    const level = readString(logging, "level", "logging");
    if (level !== undefined) {
      if (!isLogLevel(level)) {
        throw new ConfigError("logging.level must be one of debug, info, warn, error");
      }
      overrides.logging = { level };
    }
  }

  return overrides;
}

function requirePositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer`);
  }
}

function requireNonEmpty(value: string, label: string): void {
  if (value.trim() === "") {
    throw new ConfigError(`${label} must not be empty`);
  }
}

/**
 * Check that a cron expression parses. Returns the parser's message when not.
 */
export function validateCronExpression(expression: string): string | null {
  try {
    CronExpressionParser.parse(expression);
    return null;
  } catch (e) {
    return (e as Error).message;
  }
}

function validateSchedule(name: string, schedule: ScheduleConfig): void {
  requireNonEmpty(schedule.cron, `schedules.${name}.cron`);
  requireNonEmpty(schedule.command, `schedules.${name}.command`);
  const problem = validateCronExpression(schedule.cron);
  if (problem) {
    throw new ConfigError(`schedules.${name}.cron is invalid: ${problem}`);
  }
}

type Validator = (config: MaintenanceConfig) => void;

const validators: Record<string, Validator> = {
  database: (c) => {
    requireNonEmpty(c.database.server, "database.server");
    requireNonEmpty(c.database.name, "database.name");
    if (!/^[A-Za-z0-9_\-]+$/.test(c.database.name)) {
      throw new ConfigError("database.name may only contain letters, digits, '_' and '-'");
    }
    if (!Number.isInteger(c.database.port) || c.database.port < 1 || c.database.port > 65535) {
      throw new ConfigError("database.port must be between 1 and 65535");
    }
    requirePositiveInteger(c.database.backupTimeoutSeconds, "database.backupTimeoutSeconds");
  },

  storage: (c) => {
    requireNonEmpty(c.storage.uploadDir, "storage.uploadDir");
  },

  backups: (c) => {
    requireNonEmpty(c.backups.dir, "backups.dir");
    requirePositiveInteger(c.backups.databaseRetentionDays, "backups.databaseRetentionDays");
    requirePositiveInteger(c.backups.filesRetentionDays, "backups.filesRetentionDays");
    const level = c.backups.compressionLevel;
    if (!Number.isInteger(level) || level < 0 || level > 9) {
      throw new ConfigError("backups.compressionLevel must be between 0 and 9");
    }
  },

  cleanup: (c) => {
    requirePositiveInteger(c.cleanup.trashRetentionDays, "cleanup.trashRetentionDays");
    requirePositiveInteger(c.cleanup.auditLogRetentionDays, "cleanup.auditLogRetentionDays");
  },

  notifications: (c) => {
    if (!c.notifications.enabled) return;
    const { smtp } = c.notifications;
    requireNonEmpty(smtp.host, "notifications.smtp.host");
    requireNonEmpty(smtp.sender, "notifications.smtp.sender");
    if (!Number.isInteger(smtp.port) || smtp.port < 1 || smtp.port > 65535) {
      throw new ConfigError("notifications.smtp.port must be between 1 and 65535");
    }
  },

  schedules: (c) => {
    for (const [name, schedule] of Object.entries(c.schedules)) {
      validateSchedule(name, schedule);
    }
  },

  logging: (c) => {
    if (!isLogLevel(c.logging.level)) {
      throw new ConfigError("logging.level must be one of debug, info, warn, error");
    }
  },
};

/**
 * Validate a fully merged configuration
 */
export function validateConfig(config: MaintenanceConfig): void {
  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
