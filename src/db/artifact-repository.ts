/**
 * Artifact record repository
 */

import type {
  ArtifactInsert,
  ArtifactRecord,
  ArtifactSource,
  VerificationStatus,
} from "../types";
import { getCatalog } from "./connection";

export function insertArtifact(artifact: ArtifactInsert): ArtifactRecord {
  const database = getCatalog();

  database
    .prepare<ArtifactInsert>(`
      INSERT INTO artifacts (
        artifact_id, source, kind, artifact_name, artifact_path,
        size_bytes, checksum, files_count, verification, created_at
      ) VALUES (@artifact_id, @source, @kind, @artifact_name, @artifact_path,
        @size_bytes, @checksum, @files_count, @verification, @created_at)
    `)
    .run(artifact);

  const inserted = getArtifactById(artifact.artifact_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted artifact: ${artifact.artifact_id}`);
  }
  return inserted;
}

export function getArtifactById(artifactId: string): ArtifactRecord | null {
  const row = getCatalog()
    .prepare<[string], ArtifactRecord>("SELECT * FROM artifacts WHERE artifact_id = ?")
    .get(artifactId);
  return row ?? null;
}

export function getArtifactByPath(artifactPath: string): ArtifactRecord | null {
  const row = getCatalog()
    .prepare<[string], ArtifactRecord>(
      "SELECT * FROM artifacts WHERE artifact_path = ? AND status = 'active'",
    )
    .get(artifactPath);
  return row ?? null;
}

export function getActiveArtifacts(source?: ArtifactSource): ArtifactRecord[] {
  const database = getCatalog();
  if (source) {
    return database
      .prepare<[string], ArtifactRecord>(
        "SELECT * FROM artifacts WHERE status = 'active' AND source = ? ORDER BY created_at DESC",
      )
      .all(source);
  }
  return database
    .prepare<[], ArtifactRecord>(
      "SELECT * FROM artifacts WHERE status = 'active' ORDER BY created_at DESC",
    )
    .all();
}

export function getAllArtifacts(source?: ArtifactSource): ArtifactRecord[] {
  const database = getCatalog();
  if (source) {
    return database
      .prepare<[string], ArtifactRecord>(
        "SELECT * FROM artifacts WHERE source = ? ORDER BY created_at DESC",
      )
      .all(source);
  }
  return database
    .prepare<[], ArtifactRecord>("SELECT * FROM artifacts ORDER BY created_at DESC")
    .all();
}

export function updateArtifactVerification(
  artifactId: string,
  verification: VerificationStatus,
): void {
  getCatalog()
    .prepare("UPDATE artifacts SET verification = ? WHERE artifact_id = ?")
    .run(verification, artifactId);
}

export function markArtifactDeleted(artifactId: string, deletedAt: Date = new Date()): void {
  getCatalog()
    .prepare("UPDATE artifacts SET status = 'deleted', deleted_at = ? WHERE artifact_id = ?")
    .run(deletedAt.toISOString(), artifactId);
}
