/**
 * In-process stand-ins for the application database, the native backup
 * facility and the mail transport
 */

import { writeFile } from "node:fs/promises";
import type { NotificationMessage, Notifier } from "../../src/notifications";
import type {
  AuditLogEntry,
  DatabaseDumper,
  GedRecordStore,
  ResetToken,
  TrashedDocument,
} from "../../src/types";

export class InMemoryGedStore implements GedRecordStore {
  documents: TrashedDocument[] = [];
  tokens: ResetToken[] = [];
  auditLogs: AuditLogEntry[] = [];

  /** Ids whose delete call fails */
  failingDocumentIds = new Set<number>();
  failingTokenIds = new Set<number>();
  failAuditDelete = false;

  deletedDocumentIds: number[] = [];
  deletedTokenIds: number[] = [];
  deletedAuditIds: number[] = [];
  closed = false;

  async listTrashedDocuments(cutoff: Date): Promise<TrashedDocument[]> {
    return this.documents.filter((doc) => doc.deletedAt < cutoff);
  }

  async deleteDocument(documentId: number): Promise<void> {
    if (this.failingDocumentIds.has(documentId)) {
      throw new Error(`document ${documentId} is locked`);
    }
    this.documents = this.documents.filter((doc) => doc.id !== documentId);
    this.deletedDocumentIds.push(documentId);
  }

  async listResetTokens(now: Date, includeUsed: boolean): Promise<ResetToken[]> {
    return this.tokens.filter((t) => t.expiresAt < now || (includeUsed && t.used));
  }

  async deleteResetToken(tokenId: number): Promise<void> {
    if (this.failingTokenIds.has(tokenId)) {
      throw new Error(`token ${tokenId} is locked`);
    }
    this.tokens = this.tokens.filter((t) => t.id !== tokenId);
    this.deletedTokenIds.push(tokenId);
  }

  async listAuditLogsBefore(cutoff: Date): Promise<AuditLogEntry[]> {
    return this.auditLogs.filter((entry) => entry.timestamp < cutoff);
  }

  async deleteAuditLogs(ids: number[]): Promise<number> {
    if (this.failAuditDelete) {
      throw new Error("transaction rolled back");
    }
    const remove = new Set(ids);
    const before = this.auditLogs.length;
    this.auditLogs = this.auditLogs.filter((entry) => !remove.has(entry.id));
    this.deletedAuditIds.push(...ids);
    return before - this.auditLogs.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeDumper implements DatabaseDumper {
  readonly dumps: { path: string; label: string }[] = [];
  readonly verified: string[] = [];
  failDump = false;
  failVerify = false;
  closed = false;

  constructor(
    readonly databaseName: string,
    private readonly content = "backup-bytes",
  ) {}

  async dump(targetPath: string, label: string): Promise<void> {
    if (this.failDump) {
      throw new Error("BACKUP DATABASE is terminating abnormally");
    }
    await writeFile(targetPath, this.content);
    this.dumps.push({ path: targetPath, label });
  }

  async verify(targetPath: string): Promise<void> {
    if (this.failVerify) {
      throw new Error("RESTORE VERIFYONLY failed");
    }
    this.verified.push(targetPath);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeNotifier implements Notifier {
  readonly sent: NotificationMessage[] = [];
  fail = false;

  async send(message: NotificationMessage): Promise<void> {
    if (this.fail) {
      throw new Error("SMTP connection refused");
    }
    this.sent.push(message);
  }
}

export function trashedDocument(
  id: number,
  deletedAt: Date,
  overrides: Partial<TrashedDocument> = {},
): TrashedDocument {
  return {
    id,
    name: `document-${id}.pdf`,
    filePath: `docs/${id}/current.pdf`,
    sizeBytes: 2048,
    deletedAt,
    versionPaths: [],
    ...overrides,
  };
}

export function resetToken(
  id: number,
  expiresAt: Date,
  used = false,
  overrides: Partial<ResetToken> = {},
): ResetToken {
  return {
    id,
    userId: 100 + id,
    token: `token-value-${id}`,
    createdAt: new Date(expiresAt.getTime() - 60 * 60 * 1000),
    expiresAt,
    used,
    ...overrides,
  };
}

export function auditLog(id: number, timestamp: Date, action = "login"): AuditLogEntry {
  return {
    id,
    userId: 7,
    action,
    table: "documentos",
    recordId: id * 10,
    dataJson: null,
    ipAddress: "127.0.0.1",
    userAgent: "test-agent",
    timestamp,
  };
}
