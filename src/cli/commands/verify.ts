import { parseArgs } from "node:util";
import { type ArtifactCheck, checkArtifacts, errorMessage, forgetMissingArtifacts } from "../../core";
import { getActiveArtifacts, getArtifactById, initCatalog } from "../../db";
import type { ArtifactRecord } from "../../types";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", default: false },
      fix: { type: "boolean", default: false },
      force: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    await initCatalog(config.catalog.path);

    ui.intro("ged-maintenance verify");

    let artifacts: ArtifactRecord[];

    if (positionals.length > 0) {
      artifacts = [];
      for (const id of positionals) {
        const artifact = getArtifactById(id);
        if (artifact) {
          artifacts.push(artifact);
        } else {
          ui.warn(`Artifact not found: ${id}`);
        }
      }
    } else if (values.all) {
      artifacts = getActiveArtifacts();
    } else {
      ui.error("Specify artifact IDs or use --all to verify every active backup");
      return 1;
    }

    if (artifacts.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const s = ui.spinner();
    s.start(`Verifying ${artifacts.length} backup(s)...`);
    const checks = await checkArtifacts(artifacts);
    s.stop("Verification complete");

    printChecks(checks);

    const withIssues = checks.filter((c) => c.issues.length > 0);
    const missing = checks.filter((c) => c.missing);
    const unverifiable = checks.filter((c) => c.unverifiable);

    ui.note(
      formatSummary([
        { label: "Verified", value: checks.length },
        { label: "Healthy", value: checks.length - withIssues.length - unverifiable.length },
        { label: "With issues", value: withIssues.length },
        { label: "Missing", value: missing.length },
        { label: "Not visible", value: unverifiable.length > 0 ? unverifiable.length : null },
      ]),
      "Verification Summary",
    );

    if (values.fix && missing.length > 0) {
      if (!values.force) {
        if (!ui.isInteractive()) {
          ui.error("Refusing to update the catalog without confirmation; add --force");
          return 1;
        }
        const confirmed = await ui.confirm({
          message: `Mark ${missing.length} missing backup(s) as deleted?`,
          initialValue: false,
        });

        if (ui.isCancel(confirmed) || !confirmed) {
          ui.cancel("Fix cancelled");
          ui.info("Run with --fix --force to skip confirmation");
          return 1;
        }
      }

      const fixed = forgetMissingArtifacts(checks);
      ui.success(`Updated ${fixed} catalog record(s)`);
    } else if (missing.length > 0) {
      ui.info("Run with --fix to mark missing backups as deleted");
    }

    if (withIssues.length > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All backups verified!");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printChecks(checks: ArtifactCheck[]): void {
  for (const check of checks) {
    if (check.unverifiable) {
      ui.warn(`${check.artifactName} ${color.dim("(written on the database server, not visible here)")}`);
      continue;
    }
    if (check.issues.length === 0) {
      ui.success(check.artifactName);
      continue;
    }
    ui.error(check.artifactName);
    for (const issue of check.issues) {
      ui.message(`  ${color.dim("•")} ${issue}`);
    }
  }
}

function printHelp(): void {
  console.log(`
${color.bold("ged-maintenance verify")} - Re-check recorded backups

${color.dim("USAGE:")}
  ged-maintenance verify [ARTIFACT_ID...] [OPTIONS]
  ged-maintenance verify --all [OPTIONS]

${color.dim("OPTIONS:")}
      --all               Verify every active backup
      --fix               Mark backups whose files are gone as deleted (with confirmation)
      --force             Skip confirmation when using --fix
${COMMON_HELP}

${color.dim("DESCRIPTION:")}
  Checks that each backup still exists. Zip archives are read back entry
  by entry, copies are counted, and checksums recorded at backup time are
  compared.

${color.dim("EXAMPLES:")}
  ged-maintenance verify --all
  ged-maintenance verify 2f1c0e4a-5b7d-4c1e-9a3b-6d8e0f2a4c6b
  ged-maintenance verify --all --fix --force
`);
}
