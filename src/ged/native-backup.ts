/**
 * Native SQL Server backup (BACKUP DATABASE / RESTORE VERIFYONLY)
 */

import type * as sql from "mssql";
import type { DatabaseDumper, GedDatabaseConfig } from "../types";
import { openPool } from "./connection";

export function quoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, "]]")}]`;
}

export function quoteUnicode(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`;
}

export function buildBackupStatement(databaseName: string, targetPath: string, label: string): string {
  return (
    `BACKUP DATABASE ${quoteIdentifier(databaseName)} ` +
    `TO DISK = ${quoteUnicode(targetPath)} ` +
    `WITH FORMAT, INIT, COMPRESSION, NAME = ${quoteUnicode(label)}, ` +
    "SKIP, NOREWIND, NOUNLOAD, STATS = 10"
  );
}

export function buildVerifyStatement(targetPath: string): string {
  return `RESTORE VERIFYONLY FROM DISK = ${quoteUnicode(targetPath)}`;
}

export class NativeBackupDumper implements DatabaseDumper {
  private constructor(
    readonly databaseName: string,
    private readonly pool: sql.ConnectionPool,
  ) {}

  /**
   * Backups run from master with the configured backup timeout
   */
  static async connect(config: GedDatabaseConfig): Promise<NativeBackupDumper> {
    const pool = await openPool(config, {
      database: "master",
      requestTimeoutMs: config.backupTimeoutSeconds * 1000,
    });
    return new NativeBackupDumper(config.name, pool);
  }

  async dump(targetPath: string, label: string): Promise<void> {
    await this.pool.request().batch(buildBackupStatement(this.databaseName, targetPath, label));
  }

  async verify(targetPath: string): Promise<void> {
    await this.pool.request().batch(buildVerifyStatement(targetPath));
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
