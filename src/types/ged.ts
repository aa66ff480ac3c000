/**
 * Records read from the GED application database, and the seams the jobs
 * use to reach it
 */

export interface TrashedDocument {
  id: number;
  name: string;
  /** Path of the current file, relative to the upload directory */
  filePath: string | null;
  sizeBytes: number;
  deletedAt: Date;
  versionPaths: string[];
}

export interface ResetToken {
  id: number;
  userId: number;
  token: string;
  createdAt: Date;
  expiresAt: Date;
  used: boolean;
}

export interface AuditLogEntry {
  id: number;
  userId: number | null;
  action: string;
  table: string | null;
  recordId: number | null;
  dataJson: string | null;
  ipAddress: string | null;
  userAgent: string | null;
  timestamp: Date;
}

/**
 * Record-level access to the application database used by the cleanup jobs
 */
export interface GedRecordStore {
  /** Documents in the trash whose deletion date is before `cutoff` */
  listTrashedDocuments(cutoff: Date): Promise<TrashedDocument[]>;

  /** Remove a document row and the rows that depend on it, atomically */
  deleteDocument(documentId: number): Promise<void>;

  /** Tokens expired at `now`, plus used tokens when `includeUsed` */
  listResetTokens(now: Date, includeUsed: boolean): Promise<ResetToken[]>;

  deleteResetToken(tokenId: number): Promise<void>;

  listAuditLogsBefore(cutoff: Date): Promise<AuditLogEntry[]>;

  /** Delete every listed entry in one transaction; returns the affected count */
  deleteAuditLogs(ids: number[]): Promise<number>;

  close(): Promise<void>;
}

/**
 * The database engine's native backup facility
 */
export interface DatabaseDumper {
  readonly databaseName: string;

  /** Write a full backup of the database to `targetPath` */
  dump(targetPath: string, label: string): Promise<void>;

  /** Ask the engine to check that the backup at `targetPath` is restorable */
  verify(targetPath: string): Promise<void>;

  close(): Promise<void>;
}
