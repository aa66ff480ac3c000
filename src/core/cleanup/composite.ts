/**
 * Cleanup targets and the composite cleanup run
 */

import { MssqlGedStore } from "../../ged";
import type {
  CleanupReport,
  CompositeResult,
  GedRecordStore,
  MaintenanceConfig,
  PruneResult,
} from "../../types";
import { logger } from "../../utils/logger";
import { type CompositeStep, runComposite } from "../composite";
import { errorMessage } from "../errors";
import { runAuditLogCleanup } from "./audit-logs";
import { pruneArtifacts } from "./backups";
import { runTokenCleanup } from "./tokens";
import { runTrashCleanup } from "./trash";

export const CLEANUP_TARGETS = ["trash", "tokens", "audit-logs", "backups", "all"] as const;
export type CleanupTarget = (typeof CLEANUP_TARGETS)[number];

export function isCleanupTarget(value: string): value is CleanupTarget {
  return (CLEANUP_TARGETS as readonly string[]).includes(value);
}

export type CleanupStepResult = CleanupReport | PruneResult;

export interface CleanupRunOptions {
  dryRun?: boolean;
  now?: Date;
  /** Overrides cleanup.archiveAuditLogs */
  archive?: boolean;
  /** Overrides cleanup.includeUsedTokens */
  includeUsedTokens?: boolean;
}

export interface CleanupRunDeps {
  openStore?: (config: MaintenanceConfig) => Promise<GedRecordStore>;
}

export function stepSucceeded(result: CleanupStepResult): boolean {
  return "success" in result ? result.success : result.failed.length === 0;
}

export async function runCleanupTarget(
  config: MaintenanceConfig,
  target: CleanupTarget,
  options: CleanupRunOptions = {},
  deps: CleanupRunDeps = {},
): Promise<CompositeResult<CleanupStepResult>> {
  const openStore = deps.openStore ?? ((c) => MssqlGedStore.connect(c.database));
  let pending: Promise<GedRecordStore> | null = null;
  const getStore = (): Promise<GedRecordStore> => {
    pending ??= openStore(config);
    return pending;
  };

  const jobOptions = { dryRun: options.dryRun, now: options.now };
  const steps: CompositeStep<CleanupStepResult>[] = [];

  if (target === "trash" || target === "all") {
    steps.push({
      name: "trash",
      run: async () => runTrashCleanup(config, await getStore(), jobOptions),
    });
  }
  if (target === "tokens" || target === "all") {
    steps.push({
      name: "tokens",
      run: async () =>
        runTokenCleanup(config, await getStore(), {
          ...jobOptions,
          includeUsed: options.includeUsedTokens,
        }),
    });
  }
  if (target === "audit-logs" || target === "all") {
    steps.push({
      name: "audit-logs",
      run: async () =>
        runAuditLogCleanup(config, await getStore(), { ...jobOptions, archive: options.archive }),
    });
  }
  if (target === "backups") {
    steps.push(
      { name: "database-backups", run: () => pruneArtifacts(config, "database", jobOptions) },
      { name: "files-backups", run: () => pruneArtifacts(config, "files", jobOptions) },
    );
  }

  try {
    return await runComposite(steps, stepSucceeded);
  } finally {
    if (pending) {
      await closeStore(pending);
    }
  }
}

async function closeStore(pending: Promise<GedRecordStore>): Promise<void> {
  try {
    await (await pending).close();
  } catch (error) {
    logger.debug(`Closing the database connection failed: ${errorMessage(error)}`);
  }
}
