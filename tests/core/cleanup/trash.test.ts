import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { deleteStoredFile, runTrashCleanup } from "../../../src/core/cleanup/trash";
import { CleanupError } from "../../../src/core/errors";
import { closeCatalog, getDeletionLogs } from "../../../src/db";
import type { MaintenanceConfig } from "../../../src/types";
import { daysAgo, makeTempDir, makeTestConfig, removeTempDir } from "../../helpers/config";
import { InMemoryGedStore, trashedDocument } from "../../helpers/fakes";

describe("trash cleanup", () => {
  const now = new Date("2024-06-30T12:00:00.000Z");
  let root: string;
  let config: MaintenanceConfig;
  let store: InMemoryGedStore;

  async function storeFile(relativePath: string): Promise<string> {
    const absolute = path.join(config.storage.uploadDir, relativePath);
    await mkdir(path.dirname(absolute), { recursive: true });
    await writeFile(absolute, "pdf");
    return absolute;
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    root = await makeTempDir("trash");
    config = makeTestConfig(root);
    store = new InMemoryGedStore();
  });

  afterEach(async () => {
    closeCatalog();
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  test("deletes a document 31 days in the trash and keeps one at 29 days", async () => {
    const oldFile = await storeFile("docs/1/current.pdf");
    const recentFile = await storeFile("docs/2/current.pdf");
    store.documents = [trashedDocument(1, daysAgo(now, 31)), trashedDocument(2, daysAgo(now, 29))];

    const report = await runTrashCleanup(config, store, { now });

    expect(report.candidates.map((d) => d.id)).toEqual([1]);
    expect(report.deleted).toBe(1);
    expect(report.failed).toBe(0);
    expect(report.success).toBe(true);
    expect(store.deletedDocumentIds).toEqual([1]);
    expect(existsSync(oldFile)).toBe(false);
    expect(existsSync(recentFile)).toBe(true);
  });

  test("removes every version file along with the current file", async () => {
    const current = await storeFile("docs/3/v2.pdf");
    const previous = await storeFile("docs/3/v1.pdf");
    store.documents = [
      trashedDocument(3, daysAgo(now, 40), {
        filePath: "docs/3/v2.pdf",
        versionPaths: ["docs/3/v1.pdf", "docs/3/v2.pdf"],
      }),
    ];

    await runTrashCleanup(config, store, { now });

    expect(existsSync(current)).toBe(false);
    expect(existsSync(previous)).toBe(false);
  });

  test("a missing file does not stop the row deletion", async () => {
    store.documents = [trashedDocument(4, daysAgo(now, 60))];

    const report = await runTrashCleanup(config, store, { now });

    expect(report.deleted).toBe(1);
    expect(store.deletedDocumentIds).toEqual([4]);
  });

  test("dry run lists the same candidates and deletes nothing", async () => {
    const file = await storeFile("docs/1/current.pdf");
    store.documents = [trashedDocument(1, daysAgo(now, 31)), trashedDocument(5, daysAgo(now, 90))];

    const dry = await runTrashCleanup(config, store, { now, dryRun: true });

    expect(dry.dryRun).toBe(true);
    expect(dry.candidates.map((d) => d.id)).toEqual([5, 1]);
    expect(dry.processed).toBe(2);
    expect(dry.deleted).toBe(0);
    expect(store.deletedDocumentIds).toEqual([]);
    expect(existsSync(file)).toBe(true);

    const live = await runTrashCleanup(config, store, { now });
    expect(live.candidates.map((d) => d.id)).toEqual([5, 1]);
  });

  test("a failing item is logged and skipped, the rest still run", async () => {
    store.documents = [trashedDocument(1, daysAgo(now, 50)), trashedDocument(2, daysAgo(now, 40))];
    store.failingDocumentIds.add(1);

    const report = await runTrashCleanup(config, store, { now });

    expect(report.processed).toBe(2);
    expect(report.deleted).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.success).toBe(false);
    expect(report.errors).toEqual([{ id: "1", label: "document-1.pdf", error: "document 1 is locked" }]);
    expect(store.deletedDocumentIds).toEqual([2]);

    const logs = getDeletionLogs();
    expect(logs.map((l) => [l.item_id, l.success])).toEqual(
      expect.arrayContaining([
        ["1", false],
        ["2", true],
      ]),
    );
  });

  test("a stored path escaping the upload directory fails that item", async () => {
    store.documents = [trashedDocument(6, daysAgo(now, 45), { filePath: "../../outside.pdf" })];

    const report = await runTrashCleanup(config, store, { now });

    expect(report.failed).toBe(1);
    expect(report.errors[0]?.error).toBe(
      'Path "../../outside.pdf" is outside the upload directory - REFUSING TO DELETE',
    );
    expect(store.deletedDocumentIds).toEqual([]);
  });

  test("nothing to do is a success", async () => {
    const report = await runTrashCleanup(config, store, { now });
    expect(report.candidates).toEqual([]);
    expect(report.success).toBe(true);
  });

  test("a listing failure raises CleanupError in the select phase", async () => {
    vi.spyOn(store, "listTrashedDocuments").mockRejectedValue(new Error("login failed"));

    await expect(runTrashCleanup(config, store, { now })).rejects.toMatchObject({
      name: "CleanupError",
      phase: "select",
    });
    await expect(runTrashCleanup(config, store, { now })).rejects.toBeInstanceOf(CleanupError);
  });

  describe("deleteStoredFile", () => {
    test("returns false when the file is already gone", async () => {
      await mkdir(config.storage.uploadDir, { recursive: true });
      expect(await deleteStoredFile(config.storage.uploadDir, "nothing.pdf")).toBe(false);
    });
  });
});
