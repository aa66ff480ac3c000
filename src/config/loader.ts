/**
 * Configuration loading
 *
 * Layers, lowest first: built-in defaults, config file, environment
 * (including `.env`), inline CLI flags.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as dotenv from "dotenv";
import * as yaml from "js-yaml";
import type { MaintenanceConfig } from "../types";
import { CONFIG_FILE_NAMES, createDefaultConfig, mergeOverrides } from "./defaults";
import { type Environment, readEnvironment } from "./env";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { resolvePaths } from "./resolver";
import { ConfigError, parseConfigOverrides, validateConfig } from "./validator";

export interface LoadConfigOptions {
  /** Explicit config file; when omitted the working directory is searched */
  configPath?: string;
  /** Directory relative paths and `.env` are resolved against */
  cwd?: string;
  /** Environment to read, defaults to process.env */
  env?: Environment;
  /** Read `<cwd>/.env` (default true) */
  loadDotenv?: boolean;
  inline?: InlineConfigOptions;
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${(e as Error).message}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${(e as Error).message}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
      return configPath;
    }
  }
  return null;
}

/**
 * Read a config file into raw (unvalidated) data
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  return parseConfigContent(content, path.extname(absolutePath).toLowerCase());
}

/**
 * Environment merged over `<cwd>/.env`; real variables win
 */
export function readEnvWithDotenv(cwd: string, env: Environment): Environment {
  const envPath = path.join(cwd, ".env");
  if (!fs.existsSync(envPath)) {
    return env;
  }
  const parsed = dotenv.parse(fs.readFileSync(envPath));
  return { ...parsed, ...env };
}

/**
 * Load, merge, validate and resolve the maintenance configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MaintenanceConfig> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const baseEnv = options.env ?? process.env;
  const env = options.loadDotenv === false ? baseEnv : readEnvWithDotenv(cwd, baseEnv);

  let config = createDefaultConfig();

  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : findConfigFile(cwd);
  if (configPath) {
    config = mergeOverrides(config, parseConfigOverrides(await readConfigFile(configPath)));
  }

  config = mergeOverrides(config, readEnvironment(env));

  if (options.inline) {
    config = mergeOverrides(config, buildInlineConfig(options.inline));
  }

  validateConfig(config);

  return resolvePaths(config, cwd);
}
