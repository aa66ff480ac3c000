import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import {
  directorySize,
  getFileSize,
  LocalArtifactStorage,
  pathExists,
} from "../../src/storage/local";
import { computeStringHash } from "../../src/utils/crypto";
import { makeTempDir, removeTempDir } from "../helpers/config";

describe("local storage", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("local");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("helpers", () => {
    test("pathExists", async () => {
      await writeFile(path.join(tempDir, "present.txt"), "x");
      expect(await pathExists(path.join(tempDir, "present.txt"))).toBe(true);
      expect(await pathExists(path.join(tempDir, "absent.txt"))).toBe(false);
    });

    test("getFileSize returns null for missing files", async () => {
      await writeFile(path.join(tempDir, "sized.txt"), "12345");
      expect(await getFileSize(path.join(tempDir, "sized.txt"))).toBe(5);
      expect(await getFileSize(path.join(tempDir, "nope.txt"))).toBeNull();
    });

    test("directorySize sums nested files", async () => {
      const dir = path.join(tempDir, "tree");
      await mkdir(path.join(dir, "nested"), { recursive: true });
      await writeFile(path.join(dir, "a.txt"), "aaa");
      await writeFile(path.join(dir, "nested", "b.txt"), "bbbb");
      expect(await directorySize(dir)).toBe(7);
    });
  });

  describe("LocalArtifactStorage", () => {
    let storage: LocalArtifactStorage;
    let counter = 0;

    beforeEach(async () => {
      counter++;
      storage = new LocalArtifactStorage(path.join(tempDir, `store-${counter}`));
      await storage.ensureDir();
    });

    test("pathFor stays inside the root", () => {
      expect(storage.pathFor("dump.bak")).toBe(path.join(storage.rootDir, "dump.bak"));
      expect(() => storage.pathFor("../escape.bak")).toThrow("escapes the storage directory");
      expect(() => storage.pathFor(".")).toThrow("escapes the storage directory");
    });

    test("list reports files and directories", async () => {
      await writeFile(storage.pathFor("one.bak"), "1");
      await mkdir(storage.pathFor("files_backup_20240101_000000"));

      const entries = (await storage.list()).sort((a, b) => a.name.localeCompare(b.name));

      expect(entries).toEqual([
        {
          name: "files_backup_20240101_000000",
          path: storage.pathFor("files_backup_20240101_000000"),
          isDirectory: true,
        },
        { name: "one.bak", path: storage.pathFor("one.bak"), isDirectory: false },
      ]);
    });

    test("list of a missing root is empty", async () => {
      expect(await new LocalArtifactStorage(path.join(tempDir, "missing")).list()).toEqual([]);
    });

    test("getChecksum", async () => {
      await writeFile(storage.pathFor("sum.bak"), "checksum me");
      expect(await storage.getChecksum(storage.pathFor("sum.bak"))).toBe(
        computeStringHash("checksum me"),
      );
      expect(await storage.getChecksum(storage.pathFor("gone.bak"))).toBeNull();
    });

    test("remove deletes files and directories", async () => {
      await writeFile(storage.pathFor("old.bak"), "old");
      await mkdir(path.join(storage.pathFor("old-copy"), "sub"), { recursive: true });

      await storage.remove(storage.pathFor("old.bak"));
      await storage.remove(storage.pathFor("old-copy"));

      expect(existsSync(storage.pathFor("old.bak"))).toBe(false);
      expect(existsSync(storage.pathFor("old-copy"))).toBe(false);
    });

    test("remove of a missing artifact only warns", async () => {
      await expect(storage.remove(storage.pathFor("never.bak"))).resolves.toBeUndefined();
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    test("remove refuses paths outside the root", async () => {
      const outside = path.join(tempDir, "outside.txt");
      await writeFile(outside, "keep");

      await expect(storage.remove(outside)).rejects.toThrow("Refusing to delete outside");
      await expect(storage.remove(storage.rootDir)).rejects.toThrow("Refusing to delete outside");
      expect(existsSync(outside)).toBe(true);
    });
  });
});
