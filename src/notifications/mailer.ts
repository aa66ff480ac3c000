/**
 * Backup notification e-mails over SMTP
 */

import nodemailer from "nodemailer";
import { errorMessage } from "../core/errors";
import type { BackupResult, CompositeResult, MaintenanceConfig, SmtpConfig } from "../types";
import { formatBytes, formatDateTime, formatDuration } from "../utils/format";
import { logger } from "../utils/logger";

export interface NotificationMessage {
  subject: string;
  text: string;
}

export interface Notifier {
  send(message: NotificationMessage): Promise<void>;
}

export class SmtpNotifier implements Notifier {
  private readonly transport: nodemailer.Transporter;

  constructor(
    private readonly smtp: SmtpConfig,
    private readonly recipient: string,
  ) {
    this.transport = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.port === 465,
      requireTLS: smtp.useTls && smtp.port !== 465,
      auth: smtp.username ? { user: smtp.username, pass: smtp.password ?? "" } : undefined,
    });
  }

  async send(message: NotificationMessage): Promise<void> {
    await this.transport.sendMail({
      from: this.smtp.sender,
      to: this.recipient,
      subject: message.subject,
      text: message.text,
    });
  }
}

export function notificationsEnabled(config: MaintenanceConfig): boolean {
  return config.notifications.enabled && config.notifications.email.trim() !== "";
}

export function createNotifier(config: MaintenanceConfig): Notifier | null {
  if (!notificationsEnabled(config)) return null;
  return new SmtpNotifier(config.notifications.smtp, config.notifications.email);
}

function describeBackup(result: BackupResult): string {
  const lines = [
    `  Artifact: ${result.artifactName}`,
    `  Size: ${result.sizeBytes === null ? "unknown" : formatBytes(result.sizeBytes)}`,
    `  Verification: ${result.verification}`,
    `  Duration: ${formatDuration(result.durationMs)}`,
  ];
  if (result.source === "files") {
    lines.splice(2, 0, `  Files: ${result.filesCount}`);
  }
  return lines.join("\n");
}

export function formatBackupReport(
  databaseName: string,
  result: CompositeResult<BackupResult>,
  finishedAt: Date = new Date(),
): NotificationMessage {
  const status = result.success ? "SUCCESS" : "FAILED";
  const sections = result.outcomes.map((outcome) => {
    const header = `${outcome.job}: ${outcome.success ? "OK" : "FAILED"}`;
    if (outcome.result && outcome.success) {
      return `${header}\n${describeBackup(outcome.result)}`;
    }
    return `${header}\n  Error: ${outcome.error ?? "unknown error"}`;
  });

  return {
    subject: `[${databaseName}] Backup ${status} - ${formatDateTime(finishedAt)}`,
    text: [
      `Backup run finished at ${formatDateTime(finishedAt)}`,
      `Status: ${status}`,
      `Duration: ${formatDuration(result.durationMs)}`,
      "",
      ...sections,
    ].join("\n"),
  };
}

/**
 * Send the report; delivery problems are logged and never thrown
 */
export async function sendBackupReport(
  notifier: Notifier,
  databaseName: string,
  result: CompositeResult<BackupResult>,
): Promise<boolean> {
  try {
    await notifier.send(formatBackupReport(databaseName, result));
    logger.info("Backup notification sent");
    return true;
  } catch (error) {
    logger.warn(`Failed to send backup notification: ${errorMessage(error)}`);
    return false;
  }
}
