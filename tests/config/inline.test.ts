import { describe, expect, test } from "vitest";
import {
  buildInlineConfig,
  ConfigError,
  extractInlineOptions,
  hasInlineOptions,
} from "../../src/config";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("maps flag names onto options", () => {
      const options = extractInlineOptions({
        "backup-dir": "/b",
        "upload-dir": "/u",
        catalog: "/c.db",
        "database-retention-days": "30",
        "files-retention-days": "60",
        "trash-retention-days": "15",
        "audit-log-retention-days": "180",
        "no-compress": true,
        "no-verify": false,
      });

      expect(options).toEqual({
        backupDir: "/b",
        uploadDir: "/u",
        catalog: "/c.db",
        databaseRetentionDays: 30,
        filesRetentionDays: 60,
        trashRetentionDays: 15,
        auditLogRetentionDays: 180,
        noCompress: true,
        noVerify: false,
      });
    });

    test("rejects non-integer or non-positive days", () => {
      expect(() => extractInlineOptions({ "trash-retention-days": "1.5" })).toThrow(ConfigError);
      expect(() => extractInlineOptions({ "files-retention-days": "0" })).toThrow(
        '--files-retention-days must be a positive integer, got "0"',
      );
    });
  });

  describe("buildInlineConfig", () => {
    test("only the negated flags that were given turn settings off", () => {
      const layer = buildInlineConfig({ noVerify: true, noCompress: false });
      expect(layer.backups?.verifyBackups).toBe(false);
      expect(layer.backups?.compressFileBackups).toBeUndefined();
    });

    test("places retention days in their sections", () => {
      const layer = buildInlineConfig({ databaseRetentionDays: 3, auditLogRetentionDays: 400 });
      expect(layer.backups?.databaseRetentionDays).toBe(3);
      expect(layer.cleanup?.auditLogRetentionDays).toBe(400);
    });
  });

  describe("hasInlineOptions", () => {
    test("false flags and missing values do not count", () => {
      expect(hasInlineOptions({ noCompress: false, noVerify: false })).toBe(false);
      expect(hasInlineOptions({ backupDir: "/b" })).toBe(true);
      expect(hasInlineOptions({ noVerify: true })).toBe(true);
    });
  });
});
