import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { closeCatalog, getCatalog, IN_MEMORY, initCatalog } from "../../src/db/connection";
import { getCurrentVersion, getLatestVersion } from "../../src/db/migrations";

describe("catalog connection", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `ged-maintenance-catalog-test-${Date.now()}`);
    await mkdir(tempDir, { recursive: true });
    closeCatalog();
  });

  afterEach(async () => {
    closeCatalog();
    await rm(tempDir, { recursive: true, force: true });
  });

  test("creates a new catalog with all migrations applied", async () => {
    const db = await initCatalog(path.join(tempDir, "catalog.db"));
    expect(getCurrentVersion(db)).toBe(getLatestVersion());
  });

  test("creates parent directories", async () => {
    const dbPath = path.join(tempDir, "nested", "dir", "catalog.db");
    await initCatalog(dbPath);
    expect(existsSync(dbPath)).toBe(true);
  });

  test("returns the open catalog on subsequent calls", async () => {
    const first = await initCatalog(IN_MEMORY);
    const second = await initCatalog(path.join(tempDir, "ignored.db"));
    expect(second).toBe(first);
    expect(existsSync(path.join(tempDir, "ignored.db"))).toBe(false);
  });

  test("reopens an existing catalog without re-running migrations", async () => {
    const dbPath = path.join(tempDir, "existing.db");
    await initCatalog(dbPath);
    closeCatalog();

    const db = await initCatalog(dbPath);
    const rows = db.prepare<[], { version: number }>("SELECT version FROM schema_version").all();
    expect(rows).toEqual([{ version: 1 }]);
  });

  test("getCatalog throws before initialisation", () => {
    expect(() => getCatalog()).toThrow("Catalog not initialized. Call initCatalog() first.");
  });

  test("closeCatalog is safe to call twice", async () => {
    await initCatalog(IN_MEMORY);
    closeCatalog();
    expect(() => closeCatalog()).not.toThrow();
  });
});
