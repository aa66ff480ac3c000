/**
 * Catalog module exports
 */

// Artifact repository
export {
  getActiveArtifacts,
  getAllArtifacts,
  getArtifactById,
  getArtifactByPath,
  insertArtifact,
  markArtifactDeleted,
  updateArtifactVerification,
} from "./artifact-repository";

// Connection
export { closeCatalog, getCatalog, IN_MEMORY, initCatalog } from "./connection";
export type { DeletionLogInsert } from "./deletion-log-repository";
// Deletion log repository
export { getDeletionLogs, logDeletion } from "./deletion-log-repository";
export type { RawDeletionLogRow } from "./mappers";
// Mappers
export { parseDeletionLogRow, serializeBoolean } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
