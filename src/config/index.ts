/**
 * Configuration module exports
 */

// Defaults
export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  DEFAULT_SCHEDULES,
  deepMerge,
  mergeOverrides,
} from "./defaults";
// Environment
export { type Environment, parseEnvBoolean, readEnvironment } from "./env";
// Inline flags
export {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineFlagValues,
} from "./inline";
// Loader
export {
  findConfigFile,
  type LoadConfigOptions,
  loadConfig,
  readConfigFile,
  readEnvWithDotenv,
} from "./loader";
// Resolver
export { getDatabaseBackupDir, getFilesBackupDir, resolvePaths } from "./resolver";
// Validator
export { ConfigError, parseConfigOverrides, validateConfig, validateCronExpression } from "./validator";
