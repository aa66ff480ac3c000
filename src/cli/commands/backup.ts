import { parseArgs } from "node:util";
import {
  BACKUP_TARGETS,
  type BackupTarget,
  errorMessage,
  isBackupTarget,
  runBackupTarget,
} from "../../core";
import type { BackupResult, CompositeJobOutcome } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);

    let target: BackupTarget;
    const requested = positionals[0];

    if (requested !== undefined) {
      if (!isBackupTarget(requested)) {
        ui.error(`Unknown backup target: ${requested}`);
        ui.info(`Available targets: ${BACKUP_TARGETS.join(", ")}`);
        return 1;
      }
      target = requested;
      ui.intro("ged-maintenance backup");
    } else if (ui.isInteractive()) {
      ui.intro("ged-maintenance backup");

      const selected = await ui.select({
        message: "What should be backed up?",
        options: [
          { value: "database", label: "database", hint: `${config.database.name} on ${config.database.server}` },
          { value: "files", label: "files", hint: config.storage.uploadDir },
          { value: "all", label: "all", hint: "database, then files" },
        ],
      });

      if (ui.isCancel(selected) || typeof selected !== "string" || !isBackupTarget(selected)) {
        ui.cancel("Backup cancelled");
        return 1;
      }
      target = selected;
    } else {
      ui.error(`Missing backup target (${BACKUP_TARGETS.join(", ")})`);
      return 1;
    }

    const s = ui.spinner();
    s.start(values["dry-run"] ? "Planning backup..." : `Backing up ${target}...`);

    const result = await runBackupTarget(config, target, { dryRun: values["dry-run"] });

    s.stop(result.success ? "Backup finished" : "Backup finished with failures");

    for (const outcome of result.outcomes) {
      printOutcome(outcome);
    }

    if (values["dry-run"]) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    if (!result.success) {
      ui.outro(color.red(`Failed: ${result.failedJobs.join(", ")}`));
      return 1;
    }

    ui.outro(`Backup complete in ${formatDuration(result.durationMs)}`);
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printOutcome(outcome: CompositeJobOutcome<BackupResult>): void {
  const result = outcome.result;
  if (!result) {
    ui.error(`${outcome.job}: ${outcome.error ?? "failed"}`);
    return;
  }

  ui.note(
    formatSummary([
      { label: "Artifact ID", value: result.artifactId },
      { label: "Artifact", value: result.artifactName },
      { label: "Path", value: result.artifactPath },
      { label: "Size", value: result.sizeBytes === null ? "unknown" : formatBytes(result.sizeBytes) },
      { label: "Files", value: result.source === "files" ? result.filesCount : null },
      { label: "Verification", value: result.verification },
      { label: "Pruned", value: result.dryRun ? null : result.pruned },
      { label: "Duration", value: formatDuration(result.durationMs) },
      { label: "Error", value: result.error },
    ]),
    `${outcome.job} backup`,
  );
}

function printHelp(): void {
  console.log(`
${color.bold("ged-maintenance backup")} - Back up the GED database and/or uploaded documents

${color.dim("USAGE:")}
  ged-maintenance backup <database|files|all> [OPTIONS]

${color.dim("TARGETS:")}
  database                Native full backup of the application database (.bak)
  files                   Zip archive (or copy, with --no-compress) of the upload directory
  all                     database, then files; fails if either fails

  Without a target, an interactive terminal prompts for one.

${color.dim("OPTIONS:")}
      --dry-run           Show what would be backed up without doing it
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  ged-maintenance backup database
  ged-maintenance backup files --no-compress
  ged-maintenance backup all --dry-run
  ged-maintenance backup all --backup-dir /srv/backups --database-retention-days 30
`);
}
