/**
 * GED application database exports
 */

export { buildPoolConfig, openPool, type PoolOptions, withTransaction } from "./connection";
export { chunk, DELETE_CHUNK_SIZE, groupTrashedRows, MssqlGedStore, mapAuditLogRow } from "./mssql-store";
export {
  buildBackupStatement,
  buildVerifyStatement,
  NativeBackupDumper,
  quoteIdentifier,
  quoteUnicode,
} from "./native-backup";
