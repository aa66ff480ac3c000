import { parseArgs } from "node:util";
import {
  CLEANUP_TARGETS,
  type CleanupRunOptions,
  type CleanupStepResult,
  type CleanupTarget,
  errorMessage,
  isCleanupTarget,
  runCleanupTarget,
} from "../../core";
import type { CompositeJobOutcome, CompositeResult } from "../../types";
import { formatDuration } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "../context";
import { color, formatSummary, type SummaryItem, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      "no-archive": { type: "boolean", default: false },
      "exclude-used": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const requested = positionals[0];
  if (requested === undefined || !isCleanupTarget(requested)) {
    ui.error(
      requested === undefined
        ? `Missing cleanup target (${CLEANUP_TARGETS.join(", ")})`
        : `Unknown cleanup target: ${requested}`,
    );
    ui.info(`Available targets: ${CLEANUP_TARGETS.join(", ")}`);
    return 1;
  }
  const target: CleanupTarget = requested;

  try {
    const config = await loadCommandConfig(values);

    ui.intro("ged-maintenance cleanup");

    const options: CleanupRunOptions = {
      dryRun: values["dry-run"],
      archive: values["no-archive"] ? false : undefined,
      includeUsedTokens: values["exclude-used"] ? false : undefined,
    };

    // Preview and confirm before a live run when someone is watching
    if (!values["dry-run"] && !values.force && ui.isInteractive()) {
      const preview = await runCleanupTarget(config, target, { ...options, dryRun: true });
      const pending = countCandidates(preview);

      if (pending === 0 && preview.success) {
        ui.success("Nothing needs to be cleaned up");
        ui.outro("Nothing to do");
        return 0;
      }

      ui.step(`Found ${pending} item(s) to delete:`);
      for (const outcome of preview.outcomes) {
        const count = outcome.result ? candidateCount(outcome.result) : 0;
        ui.message(`  ${color.dim("•")} ${outcome.job}: ${count}`);
      }

      const confirmed = await ui.confirm({
        message: `Delete ${pending} item(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start(values["dry-run"] ? "Previewing cleanup..." : `Cleaning up ${target}...`);

    const result = await runCleanupTarget(config, target, options);

    s.stop(result.success ? "Cleanup finished" : "Cleanup finished with failures");

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

    ui.outro(`Cleanup complete in ${formatDuration(result.durationMs)}`);
    return 0;
  } catch (error) {
    ui.error(`Cleanup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function candidateCount(result: CleanupStepResult): number {
  return result.candidates.length;
}

function countCandidates(result: CompositeResult<CleanupStepResult>): number {
  return result.outcomes.reduce(
    (sum, outcome) => sum + (outcome.result ? candidateCount(outcome.result) : 0),
    0,
  );
}

export function summarizeStep(result: CleanupStepResult): SummaryItem[] {
  if ("job" in result) {
    const items: SummaryItem[] = [
      { label: "Retention", value: result.retentionDays === null ? null : `${result.retentionDays} days` },
      { label: "Candidates", value: result.candidates.length },
      { label: "Deleted", value: result.dryRun ? null : result.deleted },
      { label: "Failed", value: result.dryRun ? null : result.failed },
      { label: "Duration", value: formatDuration(result.durationMs) },
    ];
    for (const failure of result.errors) {
      items.push({ label: `  ${failure.label}`, value: color.red(failure.error) });
    }
    return items;
  }

  const items: SummaryItem[] = [
    { label: "Retention", value: `${result.retentionDays} days` },
    { label: "Candidates", value: result.candidates.length },
    { label: "Deleted", value: result.dryRun ? null : result.deleted.length },
    { label: "Failed", value: result.dryRun ? null : result.failed.length },
  ];
  for (const failure of result.failed) {
    items.push({ label: `  ${failure.name}`, value: color.red(failure.error) });
  }
  return items;
}

function printOutcome(outcome: CompositeJobOutcome<CleanupStepResult>): void {
  if (!outcome.result) {
    ui.error(`${outcome.job}: ${outcome.error ?? "failed"}`);
    return;
  }
  ui.note(formatSummary(summarizeStep(outcome.result)), outcome.job);
}

function printHelp(): void {
  console.log(`
${color.bold("ged-maintenance cleanup")} - Remove data past its retention period

${color.dim("USAGE:")}
  ged-maintenance cleanup <trash|tokens|audit-logs|backups|all> [OPTIONS]

${color.dim("TARGETS:")}
  trash                   Purge documents left in the trash longer than TRASH_RETENTION_DAYS
  tokens                  Delete expired (and, by default, used) password reset tokens
  audit-logs              Archive then delete audit entries older than AUDIT_LOG_RETENTION_DAYS
  backups                 Prune database dumps and file backups past their retention
  all                     trash, tokens, audit-logs; fails if any of them fails

${color.dim("OPTIONS:")}
      --dry-run           List what would be deleted without deleting anything
      --no-archive        Delete audit log entries without writing an archive first
      --exclude-used      Keep used reset tokens that have not expired yet
      --force             Skip the confirmation prompt
${COMMON_HELP}

  Live runs on an interactive terminal ask for confirmation first.
  Scheduled (non-interactive) runs never prompt.

${color.dim("EXAMPLES:")}
  ged-maintenance cleanup all --dry-run
  ged-maintenance cleanup trash --trash-retention-days 15
  ged-maintenance cleanup audit-logs --no-archive --force
`);
}
