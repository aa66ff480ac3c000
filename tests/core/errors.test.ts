import { describe, expect, test } from "vitest";
import { BackupError, CleanupError, errorMessage, VerificationError } from "../../src/core/errors";

describe("job errors", () => {
  test("BackupError carries its phase and cause", () => {
    const cause = new Error("disk full");
    const error = new BackupError("archive", "Archive creation failed", { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("BackupError");
    expect(error.phase).toBe("archive");
    expect(error.cause).toBe(cause);
  });

  test("VerificationError is a verify-phase BackupError", () => {
    const error = new VerificationError("checksum differs");

    expect(error).toBeInstanceOf(BackupError);
    expect(error.name).toBe("VerificationError");
    expect(error.phase).toBe("verify");
  });

  test("CleanupError", () => {
    const error = new CleanupError("delete", "rolled back");
    expect(error.phase).toBe("delete");
    expect(error.message).toBe("rolled back");
  });

  test("errorMessage", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
