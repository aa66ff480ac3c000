/**
 * Re-check recorded artifacts against what is on disk
 */

import { logDeletion, markArtifactDeleted, updateArtifactVerification } from "../../db";
import { pathExists } from "../../storage";
import type { ArtifactRecord, VerificationStatus } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { errorMessage } from "../errors";
import { verifyDirectoryCopy, verifyZipArchive } from "./archive-creator";

export interface ArtifactCheck {
  artifactId: string;
  artifactName: string;
  artifactPath: string;
  missing: boolean;
  /** Dump written where this host cannot see it; nothing to compare */
  unverifiable: boolean;
  issues: string[];
}

export async function checkArtifact(record: ArtifactRecord): Promise<ArtifactCheck> {
  const check: ArtifactCheck = {
    artifactId: record.artifact_id,
    artifactName: record.artifact_name,
    artifactPath: record.artifact_path,
    missing: false,
    unverifiable: false,
    issues: [],
  };

  if (!(await pathExists(record.artifact_path))) {
    if (record.kind === "bak" && record.size_bytes === null) {
      check.unverifiable = true;
      return check;
    }
    check.missing = true;
    check.issues.push(`Artifact missing: ${record.artifact_path}`);
    return check;
  }

  try {
    switch (record.kind) {
      case "zip":
        verifyZipArchive(record.artifact_path, record.files_count);
        break;
      case "directory":
        await verifyDirectoryCopy(record.artifact_path, record.files_count);
        break;
      case "bak":
        break;
    }
  } catch (error) {
    check.issues.push(errorMessage(error));
  }

  if (record.checksum && record.kind !== "directory") {
    const actual = await computeFileChecksum(record.artifact_path);
    if (actual !== record.checksum) {
      check.issues.push(`Checksum mismatch: expected ${record.checksum}, got ${actual}`);
    }
  }

  return check;
}

/**
 * Check every record and store the outcome in the catalog. Missing
 * artifacts keep their previous status until `forgetMissingArtifacts` runs.
 */
export async function checkArtifacts(records: ArtifactRecord[]): Promise<ArtifactCheck[]> {
  const checks: ArtifactCheck[] = [];
  for (const record of records) {
    const check = await checkArtifact(record);
    if (!check.missing && !check.unverifiable) {
      const status: VerificationStatus = check.issues.length === 0 ? "verified" : "failed";
      updateArtifactVerification(record.artifact_id, status);
    }
    const outcome = check.unverifiable
      ? "not visible from this host"
      : check.issues.length === 0
        ? "ok"
        : check.issues.join("; ");
    logger.debug(`${record.artifact_name}: ${outcome}`);
    checks.push(check);
  }
  return checks;
}

/**
 * Mark artifacts that no longer exist on disk as deleted; returns the count
 */
export function forgetMissingArtifacts(checks: ArtifactCheck[], now: Date = new Date()): number {
  let fixed = 0;
  for (const check of checks) {
    if (!check.missing) continue;
    markArtifactDeleted(check.artifactId, now);
    logDeletion({
      entity: "artifact",
      item_id: check.artifactId,
      item_label: check.artifactName,
      reason: "missing",
      success: true,
      error_message: null,
      deleted_at: now.toISOString(),
    });
    fixed++;
  }
  return fixed;
}
