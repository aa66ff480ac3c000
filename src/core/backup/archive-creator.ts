/**
 * Archive creation and verification for file backups
 */

import { createWriteStream } from "node:fs";
import { copyFile, mkdir, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import AdmZip from "adm-zip";
import archiver from "archiver";
import type { CollectedFile } from "../../types";
import { logger } from "../../utils/logger";
import { toPartialPath } from "../../utils/naming";
import { toPosixPath } from "../../utils/path";
import { errorMessage, VerificationError } from "../errors";
import { collectFiles } from "./file-collector";

/**
 * Stream `files` into a deflate zip at `targetPath`. Returns the archive size.
 */
export async function createZipArchive(
  files: CollectedFile[],
  targetPath: string,
  compression: number = 6,
): Promise<number> {
  logger.debug(`Creating zip archive with compression level ${compression}`);
  await mkdir(path.dirname(targetPath), { recursive: true });

  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(targetPath);
    const archive = archiver("zip", { zlib: { level: compression } });

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);
    archive.on("warning", (err) => {
      logger.warn(`Archive warning: ${err.message}`);
    });

    archive.pipe(output);
    for (const file of files) {
      archive.file(file.absolutePath, { name: toPosixPath(file.relativePath) });
    }
    archive.finalize().catch(reject);
  });

  return (await stat(targetPath)).size;
}

/**
 * Read every entry back (CRC checked on inflate) and compare the entry count
 */
export function verifyZipArchive(archivePath: string, expectedFiles: number): void {
  const zip = new AdmZip(archivePath);
  const entries = zip.getEntries().filter((entry) => !entry.isDirectory);

  for (const entry of entries) {
    entry.getData();
  }

  if (entries.length !== expectedFiles) {
    throw new Error(`Archive holds ${entries.length} files, expected ${expectedFiles}`);
  }
}

export type ZipVerifier = (archivePath: string, expectedFiles: number) => void;

export interface VerifiedZipOptions {
  compression: number;
  verify: boolean;
  /** Defaults to verifyZipArchive */
  verifier?: ZipVerifier;
}

/**
 * Write the zip under `<finalPath>.partial`, verify it when asked, then
 * move it to its final name. The partial file never survives a failure.
 */
export async function writeVerifiedZip(
  files: CollectedFile[],
  finalPath: string,
  options: VerifiedZipOptions,
): Promise<number> {
  const partialPath = toPartialPath(finalPath);
  const verifier = options.verifier ?? verifyZipArchive;

  try {
    const size = await createZipArchive(files, partialPath, options.compression);
    if (options.verify) {
      try {
        verifier(partialPath, files.length);
      } catch (error) {
        throw new VerificationError(`Archive verification failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      logger.debug(`Archive verified: ${files.length} entries`);
    }
    await rename(partialPath, finalPath);
    return size;
  } catch (error) {
    await rm(partialPath, { force: true });
    throw error;
  }
}

/**
 * Copy the collected files into `targetDir`, keeping their relative layout
 */
export async function copyTree(files: CollectedFile[], targetDir: string): Promise<void> {
  const dirsCreated = new Set<string>();
  await mkdir(targetDir, { recursive: true });

  for (const file of files) {
    const targetPath = path.join(targetDir, file.relativePath);
    const parentDir = path.dirname(targetPath);

    if (!dirsCreated.has(parentDir)) {
      await mkdir(parentDir, { recursive: true });
      dirsCreated.add(parentDir);
    }

    await copyFile(file.absolutePath, targetPath);
  }
}

export async function verifyDirectoryCopy(targetDir: string, expectedFiles: number): Promise<void> {
  const { files } = await collectFiles(targetDir);
  if (files.length !== expectedFiles) {
    throw new Error(`Copy holds ${files.length} files, expected ${expectedFiles}`);
  }
}

/**
 * Copy into `<finalDir>.partial`, count the copied files when asked, then
 * move the directory to its final name. The partial copy never survives a
 * failure.
 */
export async function writeVerifiedCopy(
  files: CollectedFile[],
  finalDir: string,
  options: { verify: boolean },
): Promise<void> {
  const partialDir = toPartialPath(finalDir);

  try {
    await copyTree(files, partialDir);
    if (options.verify) {
      try {
        await verifyDirectoryCopy(partialDir, files.length);
      } catch (error) {
        throw new VerificationError(`Copy verification failed: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      logger.debug(`Copy verified: ${files.length} files`);
    }
    await rename(partialDir, finalDir);
  } catch (error) {
    await rm(partialDir, { recursive: true, force: true });
    throw error;
  }
}
