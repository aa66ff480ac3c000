/**
 * Job error types
 */

export type BackupPhase = "prepare" | "dump" | "archive" | "copy" | "verify" | "record";
export type CleanupPhase = "select" | "archive" | "delete";

export class BackupError extends Error {
  readonly phase: BackupPhase;

  constructor(phase: BackupPhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackupError";
    this.phase = phase;
  }
}

export class VerificationError extends BackupError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("verify", message, options);
    this.name = "VerificationError";
  }
}

export class CleanupError extends Error {
  readonly phase: CleanupPhase;

  constructor(phase: CleanupPhase, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CleanupError";
    this.phase = phase;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
