/**
 * GedRecordStore backed by the application's SQL Server schema
 */

import * as sql from "mssql";
import type {
  AuditLogEntry,
  GedDatabaseConfig,
  GedRecordStore,
  ResetToken,
  TrashedDocument,
} from "../types";
import { openPool, withTransaction } from "./connection";

/** Parameters per DELETE ... IN (...) statement */
export const DELETE_CHUNK_SIZE = 500;

interface TrashedDocumentRow {
  id: number;
  nome: string;
  caminho_arquivo: string | null;
  tamanho_bytes: number | string;
  data_exclusao: Date;
  versao_caminho: string | null;
}

interface ResetTokenRow {
  id: number;
  usuario_id: number;
  token: string;
  data_criacao: Date;
  expiracao: Date;
  usado: boolean;
}

interface AuditLogRow {
  id: number | string;
  usuario_id: number | null;
  acao: string;
  tabela: string | null;
  registro_id: number | null;
  dados_json: string | null;
  ip_address: string | null;
  user_agent: string | null;
  data_hora: Date;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Fold the document/version join into one record per document
 */
export function groupTrashedRows(rows: TrashedDocumentRow[]): TrashedDocument[] {
  const byId = new Map<number, TrashedDocument>();
  for (const row of rows) {
    let doc = byId.get(row.id);
    if (!doc) {
      doc = {
        id: row.id,
        name: row.nome,
        filePath: row.caminho_arquivo,
        sizeBytes: Number(row.tamanho_bytes),
        deletedAt: row.data_exclusao,
        versionPaths: [],
      };
      byId.set(row.id, doc);
    }
    if (row.versao_caminho) {
      doc.versionPaths.push(row.versao_caminho);
    }
  }
  return [...byId.values()];
}

/**
 * BIGINT ids arrive as strings; ids past 2^53 cannot be represented and
 * are rejected rather than rounded
 */
export function mapAuditLogRow(row: AuditLogRow): AuditLogEntry {
  const id = Number(row.id);
  if (!Number.isSafeInteger(id)) {
    throw new Error(`Audit log id ${row.id} is outside the safe integer range`);
  }
  return {
    id,
    userId: row.usuario_id,
    action: row.acao,
    table: row.tabela,
    recordId: row.registro_id,
    dataJson: row.dados_json,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    timestamp: row.data_hora,
  };
}

export class MssqlGedStore implements GedRecordStore {
  private constructor(private readonly pool: sql.ConnectionPool) {}

  static async connect(config: GedDatabaseConfig): Promise<MssqlGedStore> {
    return new MssqlGedStore(await openPool(config));
  }

  async listTrashedDocuments(cutoff: Date): Promise<TrashedDocument[]> {
    const result = await this.pool
      .request()
      .input("cutoff", sql.DateTime2, cutoff)
      .query<TrashedDocumentRow>(`
        SELECT d.id, d.nome, d.caminho_arquivo, d.tamanho_bytes, d.data_exclusao,
               v.caminho_arquivo AS versao_caminho
        FROM documentos d
        LEFT JOIN versoes v ON v.documento_id = d.id
        WHERE d.status = 'excluido'
          AND d.data_exclusao IS NOT NULL
          AND d.data_exclusao < @cutoff
        ORDER BY d.data_exclusao, d.id, v.numero_versao
      `);
    return groupTrashedRows(result.recordset);
  }

  async deleteDocument(documentId: number): Promise<void> {
    await withTransaction(this.pool, async (transaction) => {
      const run = (statement: string) =>
        new sql.Request(transaction).input("id", sql.Int, documentId).query(statement);

      await run("DELETE FROM documento_tags WHERE documento_id = @id");
      await run(
        "IF OBJECT_ID(N'favoritos', N'U') IS NOT NULL DELETE FROM favoritos WHERE documento_id = @id",
      );
      await run("DELETE FROM versoes WHERE documento_id = @id");
      const deleted = await run("DELETE FROM documentos WHERE id = @id");
      if ((deleted.rowsAffected[0] ?? 0) === 0) {
        throw new Error(`Document ${documentId} no longer exists`);
      }
    });
  }

  async listResetTokens(now: Date, includeUsed: boolean): Promise<ResetToken[]> {
    const result = await this.pool
      .request()
      .input("now", sql.DateTime2, now)
      .input("includeUsed", sql.Bit, includeUsed)
      .query<ResetTokenRow>(`
        SELECT id, usuario_id, token, data_criacao, expiracao, usado
        FROM password_resets
        WHERE expiracao < @now OR (@includeUsed = 1 AND usado = 1)
        ORDER BY expiracao, id
      `);
    return result.recordset.map((row) => ({
      id: row.id,
      userId: row.usuario_id,
      token: row.token,
      createdAt: row.data_criacao,
      expiresAt: row.expiracao,
      used: row.usado,
    }));
  }

  async deleteResetToken(tokenId: number): Promise<void> {
    await this.pool
      .request()
      .input("id", sql.Int, tokenId)
      .query("DELETE FROM password_resets WHERE id = @id");
  }

  async listAuditLogsBefore(cutoff: Date): Promise<AuditLogEntry[]> {
    const result = await this.pool
      .request()
      .input("cutoff", sql.DateTime2, cutoff)
      .query<AuditLogRow>(`
        SELECT id, usuario_id, acao, tabela, registro_id, dados_json,
               ip_address, user_agent, data_hora
        FROM log_auditoria
        WHERE data_hora < @cutoff
        ORDER BY data_hora, id
      `);
    return result.recordset.map(mapAuditLogRow);
  }

  async deleteAuditLogs(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;

    return withTransaction(this.pool, async (transaction) => {
      let affected = 0;
      for (const group of chunk(ids, DELETE_CHUNK_SIZE)) {
        const request = new sql.Request(transaction);
        const names = group.map((id, index) => {
          request.input(`id${index}`, sql.BigInt, id);
          return `@id${index}`;
        });
        const result = await request.query(
          `DELETE FROM log_auditoria WHERE id IN (${names.join(", ")})`,
        );
        affected += result.rowsAffected[0] ?? 0;
      }
      return affected;
    });
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
