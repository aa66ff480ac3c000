/**
 * Environment variable layer
 */

import type { ConfigOverrides } from "../types";
import { isLogLevel } from "../utils/logger";
import { ConfigError } from "./validator";

export type Environment = Record<string, string | undefined>;

function readEnvString(env: Environment, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * `true` (any case) is true, anything else is false
 */
export function parseEnvBoolean(value: string): boolean {
  return value.trim().toLowerCase() === "true";
}

function readEnvBoolean(env: Environment, name: string): boolean | undefined {
  const value = readEnvString(env, name);
  return value === undefined ? undefined : parseEnvBoolean(value);
}

function readEnvInteger(env: Environment, name: string): number | undefined {
  const value = readEnvString(env, name);
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Map the maintenance environment variables onto a config layer
 */
export function readEnvironment(env: Environment): ConfigOverrides {
  const level = readEnvString(env, "LOG_LEVEL")?.toLowerCase();
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${level}"`);
  }

  return {
    database: {
      server: readEnvString(env, "DATABASE_SERVER"),
      port: readEnvInteger(env, "DATABASE_PORT"),
      name: readEnvString(env, "DATABASE_NAME"),
      user: readEnvString(env, "DATABASE_USER"),
      password: readEnvString(env, "DATABASE_PASSWORD"),
      encrypt: readEnvBoolean(env, "DATABASE_ENCRYPT"),
      trustServerCertificate: readEnvBoolean(env, "DATABASE_TRUST_SERVER_CERTIFICATE"),
      backupTimeoutSeconds: readEnvInteger(env, "DATABASE_BACKUP_TIMEOUT"),
    },
    storage: {
      uploadDir: readEnvString(env, "UPLOAD_FOLDER"),
    },
    backups: {
      dir: readEnvString(env, "BACKUP_DIR"),
      databaseRetentionDays: readEnvInteger(env, "DATABASE_RETENTION_DAYS"),
      filesRetentionDays: readEnvInteger(env, "FILES_RETENTION_DAYS"),
      compressFileBackups: readEnvBoolean(env, "COMPRESS_FILE_BACKUPS"),
      verifyBackups: readEnvBoolean(env, "VERIFY_BACKUPS"),
    },
    cleanup: {
      trashRetentionDays: readEnvInteger(env, "TRASH_RETENTION_DAYS"),
      auditLogRetentionDays: readEnvInteger(env, "AUDIT_LOG_RETENTION_DAYS"),
      auditLogArchiveDir: readEnvString(env, "AUDIT_LOG_ARCHIVE_DIR"),
    },
    notifications: {
      enabled: readEnvBoolean(env, "SEND_BACKUP_NOTIFICATIONS"),
      email: readEnvString(env, "BACKUP_NOTIFICATION_EMAIL"),
      smtp: {
        host: readEnvString(env, "MAIL_SERVER"),
        port: readEnvInteger(env, "MAIL_PORT"),
        useTls: readEnvBoolean(env, "MAIL_USE_TLS"),
        username: readEnvString(env, "MAIL_USERNAME"),
        password: readEnvString(env, "MAIL_PASSWORD"),
        sender: readEnvString(env, "MAIL_DEFAULT_SENDER"),
      },
    },
    catalog: {
      path: readEnvString(env, "CATALOG_PATH"),
    },
    logging: {
      level: level !== undefined && isLogLevel(level) ? level : undefined,
    },
  };
}
