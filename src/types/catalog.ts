/**
 * Artifact catalog record type definitions
 */

import type { ArtifactKind, ArtifactSource, VerificationStatus } from "./artifact";

export type ArtifactStatus = "active" | "deleted";
export type DeletedEntity = "artifact" | "trash" | "token" | "audit_log";
export type DeletionReason = "retention_days" | "expired" | "used" | "manual" | "missing";

export interface ArtifactRecord {
  id: number;
  artifact_id: string;
  source: ArtifactSource;
  kind: ArtifactKind;
  artifact_name: string;
  artifact_path: string;
  size_bytes: number | null;
  checksum: string | null;
  files_count: number;
  verification: VerificationStatus;
  status: ArtifactStatus;
  created_at: string;
  deleted_at: string | null;
}

export interface ArtifactInsert {
  artifact_id: string;
  source: ArtifactSource;
  kind: ArtifactKind;
  artifact_name: string;
  artifact_path: string;
  size_bytes: number | null;
  checksum: string | null;
  files_count: number;
  verification: VerificationStatus;
  /** ISO timestamp */
  created_at: string;
}

export interface DeletionLogRecord {
  id: number;
  entity: DeletedEntity;
  item_id: string;
  item_label: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
