/**
 * SQL Server connection pools for the GED application database
 */

import * as sql from "mssql";
import type { GedDatabaseConfig } from "../types";
import { debug } from "../utils/logger";

export interface PoolOptions {
  /** Connect to this database instead of the configured one */
  database?: string;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
}

export function buildPoolConfig(config: GedDatabaseConfig, options: PoolOptions = {}): sql.config {
  return {
    server: config.server,
    port: config.port,
    database: options.database ?? config.name,
    user: config.user,
    password: config.password,
    requestTimeout: options.requestTimeoutMs ?? 30_000,
    options: {
      encrypt: config.encrypt,
      trustServerCertificate: config.trustServerCertificate,
    },
  };
}

export async function openPool(
  config: GedDatabaseConfig,
  options: PoolOptions = {},
): Promise<sql.ConnectionPool> {
  const poolConfig = buildPoolConfig(config, options);
  debug(`Connecting to SQL Server ${config.server}:${config.port}/${poolConfig.database}`);
  const pool = new sql.ConnectionPool(poolConfig);
  return pool.connect();
}

/**
 * Run `work` inside a transaction, committing on success and rolling back
 * when it throws
 */
export async function withTransaction<T>(
  pool: sql.ConnectionPool,
  work: (transaction: sql.Transaction) => Promise<T>,
): Promise<T> {
  const transaction = new sql.Transaction(pool);
  await transaction.begin();
  try {
    const result = await work(transaction);
    await transaction.commit();
    return result;
  } catch (err) {
    await transaction.rollback();
    throw err;
  }
}
