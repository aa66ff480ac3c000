/**
 * Backup job type definitions
 */

export type ArtifactSource = "database" | "files";
export type ArtifactKind = "bak" | "zip" | "directory";
export type VerificationStatus = "verified" | "failed" | "skipped";

export interface BackupOptions {
  dryRun?: boolean;
}

export interface BackupResult {
  source: ArtifactSource;
  success: boolean;
  dryRun: boolean;
  artifactId: string | null;
  artifactName: string;
  artifactPath: string;
  kind: ArtifactKind;
  /** null when the dump was written somewhere this host cannot stat */
  sizeBytes: number | null;
  filesCount: number;
  verification: VerificationStatus;
  durationMs: number;
  error?: string;
  /** Artifacts removed by the retention pass that followed the backup */
  pruned: number;
}

export interface ArchiveResult {
  archiveName: string;
  archivePath: string;
  kind: ArtifactKind;
  sizeBytes: number;
  filesCount: number;
  sourceBytes: number;
  checksum: string | null;
}

export interface CollectedFile {
  absolutePath: string;
  relativePath: string;
  size: number;
}

export interface CollectFilesResult {
  files: CollectedFile[];
  totalBytes: number;
}

export interface CompositeJobOutcome<R> {
  job: string;
  success: boolean;
  result: R | null;
  error?: string;
}

export interface CompositeResult<R> {
  success: boolean;
  outcomes: CompositeJobOutcome<R>[];
  failedJobs: string[];
  durationMs: number;
}

export interface PruneResult {
  source: ArtifactSource;
  retentionDays: number;
  dryRun: boolean;
  candidates: string[];
  deleted: string[];
  failed: { name: string; error: string }[];
}
