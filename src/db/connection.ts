/**
 * Catalog connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { info, error as logError, warn } from "../utils/logger";
import {
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

export const IN_MEMORY = ":memory:";

let db: Database.Database | null = null;

async function removeMigrationBackup(backupPath: string): Promise<void> {
  try {
    await rm(backupPath, { force: true });
  } catch (err) {
    warn(`Could not remove migration backup ${backupPath}: ${(err as Error).message}`);
  }
}

export async function initCatalog(dbPath: string): Promise<Database.Database> {
  if (db) {
    return db;
  }

  if (dbPath === IN_MEMORY) {
    db = new Database(IN_MEMORY);
    initializeDatabase(db);
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (existsSync(dbPath)) {
    // Open temporarily to check migration status
    const tempDb = new Database(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      info(`Pending catalog migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        info(`Catalog migrations completed (v${currentVersion} -> v${getLatestVersion()})`);
        await removeMigrationBackup(backupPath);
      } catch (err) {
        logError(`Catalog migration failed: ${(err as Error).message}`);
        info("Rolling back catalog from backup...");

        if (db) {
          db.close();
          db = null;
        }

        await copyFile(backupPath, dbPath);
        await removeMigrationBackup(backupPath);

        throw new Error(`Catalog migration failed and was rolled back: ${(err as Error).message}`);
      }

      return db;
    }
  }

  db = new Database(dbPath);
  initializeDatabase(db);

  return db;
}

export function getCatalog(): Database.Database {
  if (!db) {
    throw new Error("Catalog not initialized. Call initCatalog() first.");
  }
  return db;
}

export function closeCatalog(): void {
  if (db) {
    db.close();
    db = null;
  }
}
