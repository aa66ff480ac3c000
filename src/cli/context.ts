/**
 * Options shared by every command and the config loading they all start with
 */

import { extractInlineOptions, INLINE_CONFIG_OPTIONS, type InlineFlagValues, loadConfig } from "../config";
import type { MaintenanceConfig } from "../types";
import { setLogLevel } from "../utils/logger";

export const COMMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export interface CommonFlagValues extends InlineFlagValues {
  config?: string;
  verbose?: boolean;
}

/**
 * Load the layered configuration for a command. `--verbose` wins over the
 * configured log level.
 */
export async function loadCommandConfig(values: CommonFlagValues): Promise<MaintenanceConfig> {
  const config = await loadConfig({
    configPath: values.config,
    inline: extractInlineOptions(values),
  });
  setLogLevel(values.verbose ? "debug" : config.logging.level);
  return config;
}

export const COMMON_HELP = `  -c, --config <path>     Path to config file (default: ./ged-maintenance.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

      --backup-dir <path>                Backup root directory (BACKUP_DIR)
      --upload-dir <path>                Document upload directory (UPLOAD_DIR)
      --catalog <path>                   Artifact catalog file
      --database-retention-days <n>      Days to keep database dumps
      --files-retention-days <n>         Days to keep file backups
      --trash-retention-days <n>         Days documents stay in the trash
      --audit-log-retention-days <n>     Days to keep audit log entries
      --no-compress                      Copy the upload tree instead of zipping it
      --no-verify                        Skip backup verification`;
