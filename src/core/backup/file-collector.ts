/**
 * File collection for backup archives
 */

import * as fs from "node:fs";
import * as path from "node:path";
import fg from "fast-glob";
import type { CollectFilesResult, CollectedFile } from "../../types";
import { logger } from "../../utils/logger";

/**
 * Every regular file under `baseDir`, dot files included, sorted by
 * relative path
 */
export async function collectFiles(baseDir: string): Promise<CollectFilesResult> {
  const basePath = path.resolve(baseDir);

  if (!fs.existsSync(basePath)) {
    logger.warn(`Source path does not exist: ${basePath}`);
    return { files: [], totalBytes: 0 };
  }

  const entries = await fg("**/*", {
    cwd: basePath,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    stats: true,
  });

  const files: CollectedFile[] = entries
    .map((entry) => ({
      absolutePath: path.join(basePath, entry.path),
      relativePath: entry.path,
      size: entry.stats?.size ?? 0,
    }))
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));

  const totalBytes = files.reduce((sum, file) => sum + file.size, 0);
  logger.debug(`Collected ${files.length} files from ${basePath}`);

  return { files, totalBytes };
}
