/**
 * Storage module exports
 */

export {
  directorySize,
  getFileSize,
  LocalArtifactStorage,
  pathExists,
  type StoredEntry,
} from "./local";
