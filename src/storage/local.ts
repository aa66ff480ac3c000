/**
 * Local filesystem storage for backup artifacts
 */

import { constants } from "node:fs";
import { access, mkdir, readdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { computeFileChecksum } from "../utils/crypto";
import { logger } from "../utils/logger";
import { isPathWithinDir } from "../utils/path";

export interface StoredEntry {
  name: string;
  path: string;
  isDirectory: boolean;
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await access(targetPath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size in bytes, or null when the path is not visible from this host
 */
export async function getFileSize(targetPath: string): Promise<number | null> {
  try {
    return (await stat(targetPath)).size;
  } catch {
    return null;
  }
}

export async function directorySize(dirPath: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dirPath, { withFileTypes: true })) {
    const entryPath = path.join(dirPath, entry.name);
    total += entry.isDirectory() ? await directorySize(entryPath) : (await stat(entryPath)).size;
  }
  return total;
}

export class LocalArtifactStorage {
  constructor(readonly rootDir: string) {}

  async ensureDir(): Promise<void> {
    await mkdir(this.rootDir, { recursive: true });
  }

  pathFor(name: string): string {
    const target = path.join(this.rootDir, name);
    if (!isPathWithinDir(target, this.rootDir) || target === path.resolve(this.rootDir)) {
      throw new Error(`Artifact name escapes the storage directory: ${name}`);
    }
    return target;
  }

  async list(): Promise<StoredEntry[]> {
    if (!(await pathExists(this.rootDir))) return [];
    const entries = await readdir(this.rootDir, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      path: path.join(this.rootDir, entry.name),
      isDirectory: entry.isDirectory(),
    }));
  }

  async exists(targetPath: string): Promise<boolean> {
    return pathExists(targetPath);
  }

  async getChecksum(targetPath: string): Promise<string | null> {
    if (!(await pathExists(targetPath))) return null;
    return computeFileChecksum(targetPath);
  }

  /**
   * Remove a file or directory inside the storage directory
   */
  async remove(targetPath: string): Promise<void> {
    if (!isPathWithinDir(targetPath, this.rootDir) || path.resolve(targetPath) === path.resolve(this.rootDir)) {
      throw new Error(`Refusing to delete outside ${this.rootDir}: ${targetPath}`);
    }

    if (!(await pathExists(targetPath))) {
      logger.warn(`Artifact not found (already deleted?): ${targetPath}`);
      return;
    }

    await rm(targetPath, { recursive: true, force: true });
    logger.debug(`Deleted artifact: ${targetPath}`);
  }
}
