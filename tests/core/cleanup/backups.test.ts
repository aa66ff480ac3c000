import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { getDatabaseBackupDir, getFilesBackupDir } from "../../../src/config/resolver";
import { getArtifactStorage, pruneArtifacts } from "../../../src/core/cleanup/backups";
import { validatePruneCandidate } from "../../../src/core/cleanup/validator";
import {
  closeCatalog,
  getArtifactById,
  getDeletionLogs,
  initCatalog,
  insertArtifact,
} from "../../../src/db";
import type { MaintenanceConfig } from "../../../src/types";
import { computeStringHash } from "../../../src/utils/crypto";
import { makeTempDir, makeTestConfig, removeTempDir } from "../../helpers/config";

describe("backup pruning", () => {
  // Names carry local time, so the clock is local too
  const now = new Date(2024, 5, 30, 12, 0, 0);
  let root: string;
  let config: MaintenanceConfig;
  let dbDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    root = await makeTempDir("prune");
    config = makeTestConfig(root);
    config.backups.databaseRetentionDays = 30;
    dbDir = getDatabaseBackupDir(config);
    await mkdir(dbDir, { recursive: true });
    await writeFile(path.join(dbDir, "sistema_ged_backup_20240529_120000.bak"), "old");
    await writeFile(path.join(dbDir, "sistema_ged_backup_20240415_020000.bak"), "older");
    await writeFile(path.join(dbDir, "sistema_ged_backup_20240602_020000.bak"), "recent");
    await writeFile(path.join(dbDir, "other_db_backup_20200101_000000.bak"), "foreign");
    await writeFile(path.join(dbDir, "sistema_ged_backup_20200101_000000.bak.partial"), "partial");
    await writeFile(path.join(dbDir, "readme.txt"), "keep");
  });

  afterEach(async () => {
    closeCatalog();
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  test("deletes only recognised artifacts past retention, oldest first", async () => {
    const result = await pruneArtifacts(config, "database", { now });

    expect(result.candidates).toEqual([
      "sistema_ged_backup_20240415_020000.bak",
      "sistema_ged_backup_20240529_120000.bak",
    ]);
    expect(result.deleted).toEqual(result.candidates);
    expect(result.failed).toEqual([]);
    expect(existsSync(path.join(dbDir, "sistema_ged_backup_20240602_020000.bak"))).toBe(true);
    expect(existsSync(path.join(dbDir, "other_db_backup_20200101_000000.bak"))).toBe(true);
    expect(existsSync(path.join(dbDir, "sistema_ged_backup_20200101_000000.bak.partial"))).toBe(
      true,
    );
    expect(existsSync(path.join(dbDir, "readme.txt"))).toBe(true);
  });

  test("an artifact exactly at the retention age is kept", async () => {
    await writeFile(path.join(dbDir, "sistema_ged_backup_20240531_120000.bak"), "boundary");

    const result = await pruneArtifacts(config, "database", { now, dryRun: true });

    expect(result.candidates).not.toContain("sistema_ged_backup_20240531_120000.bak");
  });

  test("dry run lists the same candidates and deletes nothing", async () => {
    const result = await pruneArtifacts(config, "database", { now, dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.candidates).toHaveLength(2);
    expect(result.deleted).toEqual([]);
    expect(existsSync(path.join(dbDir, "sistema_ged_backup_20240415_020000.bak"))).toBe(true);
  });

  test("catalogued artifacts are marked deleted", async () => {
    await initCatalog(config.catalog.path);
    const artifactPath = path.join(dbDir, "sistema_ged_backup_20240415_020000.bak");
    insertArtifact({
      artifact_id: "old-dump",
      source: "database",
      kind: "bak",
      artifact_name: "sistema_ged_backup_20240415_020000.bak",
      artifact_path: artifactPath,
      size_bytes: 5,
      checksum: computeStringHash("older"),
      files_count: 0,
      verification: "verified",
      created_at: new Date(2024, 3, 15, 2, 0, 0).toISOString(),
    });

    await pruneArtifacts(config, "database", { now });

    expect(getArtifactById("old-dump")).toMatchObject({
      status: "deleted",
      deleted_at: now.toISOString(),
    });
    const logged = getDeletionLogs().find((log) => log.item_id === "old-dump");
    expect(logged).toMatchObject({ reason: "retention_days", success: true });
  });

  test("a modified artifact is refused", async () => {
    await initCatalog(config.catalog.path);
    const artifactPath = path.join(dbDir, "sistema_ged_backup_20240529_120000.bak");
    insertArtifact({
      artifact_id: "tampered",
      source: "database",
      kind: "bak",
      artifact_name: "sistema_ged_backup_20240529_120000.bak",
      artifact_path: artifactPath,
      size_bytes: 3,
      checksum: computeStringHash("something else"),
      files_count: 0,
      verification: "verified",
      created_at: new Date(2024, 4, 29, 12, 0, 0).toISOString(),
    });

    const result = await pruneArtifacts(config, "database", { now });

    expect(result.deleted).toEqual(["sistema_ged_backup_20240415_020000.bak"]);
    expect(result.failed).toEqual([
      {
        name: "sistema_ged_backup_20240529_120000.bak",
        error: `Checksum mismatch for "${artifactPath}" - REFUSING TO DELETE (file may have been modified)`,
      },
    ]);
    expect(existsSync(artifactPath)).toBe(true);
  });

  test("file archives use their own retention", async () => {
    config.backups.filesRetentionDays = 7;
    const filesDir = getFilesBackupDir(config);
    await mkdir(path.join(filesDir, "files_backup_20240601_030000"), { recursive: true });
    await writeFile(path.join(filesDir, "files_backup_20240620_030000.zip"), "zip");
    await writeFile(path.join(filesDir, "files_backup_20240628_030000.zip"), "zip");

    const result = await pruneArtifacts(config, "files", { now });

    expect(result.retentionDays).toBe(7);
    expect(result.deleted).toEqual([
      "files_backup_20240601_030000",
      "files_backup_20240620_030000.zip",
    ]);
    expect(existsSync(path.join(filesDir, "files_backup_20240601_030000"))).toBe(false);
  });

  test("a missing backup directory prunes nothing", async () => {
    const result = await pruneArtifacts(config, "files", { now });
    expect(result.candidates).toEqual([]);
  });
});

describe("validatePruneCandidate", () => {
  let root: string;
  let config: MaintenanceConfig;

  beforeEach(async () => {
    root = await makeTempDir("validate");
    config = makeTestConfig(root);
    await initCatalog(config.catalog.path);
  });

  afterEach(async () => {
    closeCatalog();
    await removeTempDir(root);
  });

  test("refuses names that belong to another source", async () => {
    const storage = getArtifactStorage(config, "database");
    const name = "files_backup_20240101_000000.zip";

    const result = await validatePruneCandidate(
      { name, path: path.join(storage.rootDir, name), isDirectory: false },
      "database",
      storage,
      "sistema_ged",
    );

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([`"${name}" is not a database backup artifact - REFUSING TO DELETE`]);
  });

  test("refuses paths outside the backup directory", async () => {
    const storage = getArtifactStorage(config, "database");
    const name = "sistema_ged_backup_20240101_000000.bak";

    const result = await validatePruneCandidate(
      { name, path: path.join(root, "elsewhere", name), isDirectory: false },
      "database",
      storage,
      "sistema_ged",
    );

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain("is outside the backup directory");
  });

  test("uncatalogued artifacts only warn", async () => {
    const storage = getArtifactStorage(config, "files");
    const name = "files_backup_20240101_000000.zip";

    const result = await validatePruneCandidate(
      { name, path: path.join(storage.rootDir, name), isDirectory: false },
      "files",
      storage,
      "sistema_ged",
    );

    expect(result).toEqual({
      valid: true,
      errors: [],
      warnings: [`"${name}" is not in the catalog`],
      record: null,
    });
  });
});
