import { describe, expect, test } from "vitest";
import { ConfigError, parseEnvBoolean, readEnvironment } from "../../src/config";

describe("environment layer", () => {
  test("parseEnvBoolean is true only for 'true' in any case", () => {
    expect(parseEnvBoolean("true")).toBe(true);
    expect(parseEnvBoolean(" TRUE ")).toBe(true);
    expect(parseEnvBoolean("1")).toBe(false);
    expect(parseEnvBoolean("yes")).toBe(false);
  });

  test("maps variables onto config sections", () => {
    const layer = readEnvironment({
      DATABASE_SERVER: "sql01",
      DATABASE_PORT: "1533",
      DATABASE_NAME: "ged",
      UPLOAD_FOLDER: "/data/uploads",
      BACKUP_DIR: "/data/backups",
      COMPRESS_FILE_BACKUPS: "false",
      AUDIT_LOG_ARCHIVE_DIR: "/data/archive",
      SEND_BACKUP_NOTIFICATIONS: "true",
      BACKUP_NOTIFICATION_EMAIL: "ops@example.com",
      MAIL_SERVER: "smtp.example.com",
      MAIL_PORT: "465",
      MAIL_USERNAME: "mailer",
      MAIL_PASSWORD: "test-secret",
      LOG_LEVEL: "DEBUG",
    });

    expect(layer.database?.server).toBe("sql01");
    expect(layer.database?.port).toBe(1533);
    expect(layer.database?.name).toBe("ged");
    expect(layer.storage?.uploadDir).toBe("/data/uploads");
    expect(layer.backups?.dir).toBe("/data/backups");
    expect(layer.backups?.compressFileBackups).toBe(false);
    expect(layer.cleanup?.auditLogArchiveDir).toBe("/data/archive");
    expect(layer.notifications?.enabled).toBe(true);
    expect(layer.notifications?.email).toBe("ops@example.com");
    expect(layer.notifications?.smtp).toEqual({
      host: "smtp.example.com",
      port: 465,
      useTls: undefined,
      username: "mailer",
      password: "test-secret",
      sender: undefined,
    });
    expect(layer.logging?.level).toBe("debug");
  });

  test("empty variables are treated as unset", () => {
    const layer = readEnvironment({ BACKUP_DIR: "", DATABASE_PORT: "" });
    expect(layer.backups?.dir).toBeUndefined();
    expect(layer.database?.port).toBeUndefined();
  });

  test("rejects non-integer numbers", () => {
    expect(() => readEnvironment({ TRASH_RETENTION_DAYS: "thirty" })).toThrow(
      'TRASH_RETENTION_DAYS must be an integer, got "thirty"',
    );
  });

  test("rejects unknown log levels", () => {
    expect(() => readEnvironment({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });
});
