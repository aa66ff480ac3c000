import { describe, expect, test } from "vitest";
import { createDefaultConfig } from "../../src/config";
import {
  buildBackupStatement,
  buildPoolConfig,
  buildVerifyStatement,
  chunk,
  groupTrashedRows,
  mapAuditLogRow,
  quoteIdentifier,
  quoteUnicode,
} from "../../src/ged";

describe("native backup statements", () => {
  test("quoting", () => {
    expect(quoteIdentifier("sistema_ged")).toBe("[sistema_ged]");
    expect(quoteIdentifier("odd]name")).toBe("[odd]]name]");
    expect(quoteUnicode("D:\\backups\\o'brien.bak")).toBe("N'D:\\backups\\o''brien.bak'");
  });

  test("BACKUP DATABASE", () => {
    expect(
      buildBackupStatement("sistema_ged", "D:\\backups\\db.bak", "sistema_ged Full Backup"),
    ).toBe(
      "BACKUP DATABASE [sistema_ged] TO DISK = N'D:\\backups\\db.bak' " +
        "WITH FORMAT, INIT, COMPRESSION, NAME = N'sistema_ged Full Backup', " +
        "SKIP, NOREWIND, NOUNLOAD, STATS = 10",
    );
  });

  test("RESTORE VERIFYONLY", () => {
    expect(buildVerifyStatement("/var/backups/db.bak")).toBe(
      "RESTORE VERIFYONLY FROM DISK = N'/var/backups/db.bak'",
    );
  });
});

describe("pool configuration", () => {
  test("uses the configured database unless overridden", () => {
    const database = { ...createDefaultConfig().database, password: "test-secret" };

    expect(buildPoolConfig(database)).toEqual({
      server: "localhost",
      port: 1433,
      database: "sistema_ged",
      user: "sa",
      password: "test-secret",
      requestTimeout: 30_000,
      options: { encrypt: false, trustServerCertificate: true },
    });
    expect(buildPoolConfig(database, { database: "master", requestTimeoutMs: 5000 })).toMatchObject({
      database: "master",
      requestTimeout: 5000,
    });
  });
});

describe("row mapping", () => {
  const deletedAt = new Date("2024-05-01T10:00:00.000Z");

  test("chunk", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 500)).toEqual([]);
  });

  test("groupTrashedRows folds versions into their document", () => {
    const base = { nome: "contrato.pdf", tamanho_bytes: "4096", data_exclusao: deletedAt };
    const docs = groupTrashedRows([
      { ...base, id: 1, caminho_arquivo: "1/current.pdf", versao_caminho: "1/v1.pdf" },
      { ...base, id: 1, caminho_arquivo: "1/current.pdf", versao_caminho: "1/v2.pdf" },
      { ...base, id: 2, caminho_arquivo: null, versao_caminho: null },
    ]);

    expect(docs).toEqual([
      {
        id: 1,
        name: "contrato.pdf",
        filePath: "1/current.pdf",
        sizeBytes: 4096,
        deletedAt,
        versionPaths: ["1/v1.pdf", "1/v2.pdf"],
      },
      {
        id: 2,
        name: "contrato.pdf",
        filePath: null,
        sizeBytes: 4096,
        deletedAt,
        versionPaths: [],
      },
    ]);
  });

  test("mapAuditLogRow converts bigint ids", () => {
    expect(
      mapAuditLogRow({
        id: "9007",
        usuario_id: 3,
        acao: "download",
        tabela: "documentos",
        registro_id: 12,
        dados_json: '{"versao":2}',
        ip_address: "10.0.0.5",
        user_agent: null,
        data_hora: deletedAt,
      }),
    ).toEqual({
      id: 9007,
      userId: 3,
      action: "download",
      table: "documentos",
      recordId: 12,
      dataJson: '{"versao":2}',
      ipAddress: "10.0.0.5",
      userAgent: null,
      timestamp: deletedAt,
    });
  });

  test("mapAuditLogRow refuses ids past the safe integer range", () => {
    expect(() =>
      mapAuditLogRow({
        id: "9007199254740993",
        usuario_id: null,
        acao: "login",
        tabela: null,
        registro_id: null,
        dados_json: null,
        ip_address: null,
        user_agent: null,
        data_hora: deletedAt,
      }),
    ).toThrow("Audit log id 9007199254740993 is outside the safe integer range");
  });
});
