/**
 * Default configuration values
 */

import type { ConfigOverrides, MaintenanceConfig, ScheduleConfig } from "../types";
import { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "ged-maintenance.config.yaml",
  "ged-maintenance.config.yml",
  "ged-maintenance.config.json",
];

export const DEFAULT_SCHEDULES: Record<string, ScheduleConfig> = {
  database: {
    cron: "0 2 * * *",
    command: "backup database",
    description: "Daily database backup",
  },
  files: {
    cron: "0 3 * * 0",
    command: "backup files",
    description: "Weekly document storage backup",
  },
  full: {
    cron: "0 2 * * 0",
    command: "backup all",
    description: "Weekly full backup",
  },
  cleanup: {
    cron: "0 4 * * *",
    command: "cleanup all",
    description: "Daily cleanup of trash, tokens and audit logs",
  },
};

/**
 * Built-in defaults. Empty archive/catalog paths are derived from the
 * backup directory by the resolver.
 */
export function createDefaultConfig(): MaintenanceConfig {
  return {
    database: {
      server: "localhost",
      port: 1433,
      name: "sistema_ged",
      user: "sa",
      password: "",
      encrypt: false,
      trustServerCertificate: true,
      backupTimeoutSeconds: 3600,
    },
    storage: {
      uploadDir: "./uploads",
    },
    backups: {
      dir: "./backups",
      databaseRetentionDays: 90,
      filesRetentionDays: 90,
      compressFileBackups: true,
      verifyBackups: true,
      compressionLevel: 6,
    },
    cleanup: {
      trashRetentionDays: 30,
      auditLogRetentionDays: 365,
      auditLogArchiveDir: "",
      archiveAuditLogs: true,
      includeUsedTokens: true,
    },
    notifications: {
      enabled: false,
      email: "",
      smtp: {
        host: "smtp.gmail.com",
        port: 587,
        useTls: true,
        sender: "noreply@example.com",
      },
    },
    catalog: {
      path: "",
    },
    schedules: Object.fromEntries(
      Object.entries(DEFAULT_SCHEDULES).map(([name, schedule]) => [name, { ...schedule }]),
    ),
    logging: {
      level: "info",
    },
  };
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      typeof sourceValue === "object" &&
      sourceValue !== null &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === "object" &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      (result as Record<string, unknown>)[key] = deepMerge(
        targetValue as object,
        sourceValue as object,
      );
    } else if (sourceValue !== undefined) {
      (result as Record<string, unknown>)[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Apply one override layer (config file, environment or CLI flags)
 */
export function mergeOverrides(
  config: MaintenanceConfig,
  overrides: ConfigOverrides,
): MaintenanceConfig {
  const { smtp, ...notifications } = overrides.notifications ?? {};

  const schedules = { ...config.schedules };
  for (const [name, partial] of Object.entries(overrides.schedules ?? {})) {
    const base = schedules[name];
    if (base) {
      schedules[name] = deepMerge(base, partial);
    } else if (partial.cron !== undefined && partial.command !== undefined) {
      schedules[name] = { ...partial, cron: partial.cron, command: partial.command };
    } else {
      throw new ConfigError(`schedules.${name} needs both 'cron' and 'command'`);
    }
  }

  return {
    database: deepMerge(config.database, overrides.database ?? {}),
    storage: deepMerge(config.storage, overrides.storage ?? {}),
    backups: deepMerge(config.backups, overrides.backups ?? {}),
    cleanup: deepMerge(config.cleanup, overrides.cleanup ?? {}),
    notifications: {
      ...deepMerge(config.notifications, notifications),
      smtp: deepMerge(config.notifications.smtp, smtp ?? {}),
    },
    catalog: deepMerge(config.catalog, overrides.catalog ?? {}),
    schedules,
    logging: deepMerge(config.logging, overrides.logging ?? {}),
  };
}
