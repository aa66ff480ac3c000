import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
  runMigrations,
} from "../../src/db/migrations";

describe("catalog migrations", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  test("migrations are ordered by version starting at 1", () => {
    const versions = getAllMigrations().map((m) => m.version);
    expect(versions[0]).toBe(1);
    expect(versions).toEqual([...versions].sort((a, b) => a - b));
    expect(getLatestVersion()).toBe(versions[versions.length - 1]);
  });

  test("a fresh database is at version 0", () => {
    expect(getCurrentVersion(db)).toBe(0);
    expect(getPendingMigrations(0)).toHaveLength(getAllMigrations().length);
  });

  test("initializeDatabase creates the catalog tables", () => {
    initializeDatabase(db);

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name);

    expect(tables).toEqual(["artifacts", "deletion_log", "schema_version"]);
    expect(getCurrentVersion(db)).toBe(getLatestVersion());
    expect(getPendingMigrations(getCurrentVersion(db))).toEqual([]);
  });

  test("initializeDatabase is idempotent", () => {
    initializeDatabase(db);
    initializeDatabase(db);

    const count = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM schema_version").get();
    expect(count?.n).toBe(getAllMigrations().length);
  });

  test("a failing migration leaves no partial schema", () => {
    expect(() =>
      runMigrations(db, [
        ...getAllMigrations(),
        { version: 99, name: "broken", description: "", up: "CREATE TABLE oops (" },
      ]),
    ).toThrow();

    expect(getCurrentVersion(db)).toBe(0);
  });
});
