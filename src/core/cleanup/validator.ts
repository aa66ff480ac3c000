/**
 * Safety checks before an expired backup artifact is deleted
 */

import { getArtifactByPath } from "../../db";
import type { LocalArtifactStorage, StoredEntry } from "../../storage";
import type { ArtifactRecord, ArtifactSource } from "../../types";
import { isPathWithinDir } from "../../utils/path";
import { parseArtifactName } from "../../utils/naming";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  record: ArtifactRecord | null;
}

/**
 * Refuse to delete anything that is not one of our artifacts, or whose
 * contents no longer match the checksum the catalog recorded for it.
 */
export async function validatePruneCandidate(
  entry: StoredEntry,
  source: ArtifactSource,
  storage: LocalArtifactStorage,
  databaseName: string,
): Promise<ValidationResult> {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = parseArtifactName(entry.name, source === "database" ? databaseName : undefined);
  if (!parsed || parsed.source !== source) {
    errors.push(`"${entry.name}" is not a ${source} backup artifact - REFUSING TO DELETE`);
    return { valid: false, errors, warnings, record: null };
  }

  if (!isPathWithinDir(entry.path, storage.rootDir)) {
    errors.push(
      `Path "${entry.path}" is outside the backup directory "${storage.rootDir}" - REFUSING TO DELETE`,
    );
    return { valid: false, errors, warnings, record: null };
  }

  const record = getArtifactByPath(entry.path);
  if (!record) {
    warnings.push(`"${entry.name}" is not in the catalog`);
  } else if (record.checksum && !entry.isDirectory) {
    const actualChecksum = await storage.getChecksum(entry.path);
    if (actualChecksum && actualChecksum !== record.checksum) {
      errors.push(
        `Checksum mismatch for "${entry.path}" - REFUSING TO DELETE (file may have been modified)`,
      );
      return { valid: false, errors, warnings, record };
    }
  }

  return { valid: errors.length === 0, errors, warnings, record };
}
