import { parseArgs } from "node:util";
import { errorMessage } from "../../core";
import { getActiveArtifacts, getAllArtifacts, initCatalog } from "../../db";
import type { ArtifactRecord, ArtifactSource } from "../../types";
import { formatBytes } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "../context";
import { color, csvField, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const OUTPUT_FORMATS = ["table", "json", "csv"] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function isArtifactSource(value: string): value is ArtifactSource {
  return value === "database" || value === "files";
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      source: { type: "string", short: "s" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
      all: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (!isOutputFormat(values.format)) {
    ui.error(`Unknown format: ${values.format} (expected ${OUTPUT_FORMATS.join(", ")})`);
    return 1;
  }
  const format = values.format;

  let source: ArtifactSource | undefined;
  if (values.source !== undefined) {
    if (!isArtifactSource(values.source)) {
      ui.error(`Unknown source: ${values.source} (expected database or files)`);
      return 1;
    }
    source = values.source;
  }

  try {
    const config = await loadCommandConfig(values);
    await initCatalog(config.catalog.path);

    let artifacts = values.all ? getAllArtifacts(source) : getActiveArtifacts(source);

    const limit = values.limit ? parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      artifacts = artifacts.slice(0, limit);
    }

    // No intro for scripting formats
    switch (format) {
      case "json":
        console.log(JSON.stringify(artifacts, null, 2));
        return 0;
      case "csv":
        console.log(formatCsv(artifacts));
        return 0;
      case "table":
        ui.intro("ged-maintenance list");

        if (artifacts.length === 0) {
          ui.info("No backups found");
          ui.outro("Done");
          return 0;
        }

        printTable(artifacts, values.verbose);

        ui.outro(`${artifacts.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function formatSize(artifact: ArtifactRecord): string {
  return artifact.size_bytes === null ? "unknown" : formatBytes(artifact.size_bytes);
}

function formatStatus(artifact: ArtifactRecord): string {
  return artifact.status === "active" ? color.green("active") : color.red("deleted");
}

function printTable(artifacts: ArtifactRecord[], verbose: boolean): void {
  const w = TABLE_WIDTHS;
  const widths = verbose
    ? [w.artifactId, w.source, w.created, w.size, w.files, w.verification, w.status]
    : [w.artifactName, w.source, w.created, w.size, w.status];
  const headers = verbose
    ? ["ID", "Source", "Created", "Size", "Files", "Verified", "Status"]
    : ["Artifact", "Source", "Created", "Size", "Status"];

  ui.step("Backups:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const artifact of artifacts) {
    const created = artifact.created_at.substring(0, 19).replace("T", " ");
    const row = verbose
      ? [
          artifact.artifact_id,
          artifact.source,
          created,
          formatSize(artifact),
          String(artifact.files_count),
          artifact.verification,
          formatStatus(artifact),
        ]
      : [artifact.artifact_name, artifact.source, created, formatSize(artifact), formatStatus(artifact)];
    console.log(formatTableRow(row, widths));
  }

  console.log(formatTableSeparator(widths));
}

export function formatCsv(artifacts: ArtifactRecord[]): string {
  const lines = [
    "artifact_id,source,kind,artifact_name,artifact_path,created_at,size_bytes,files_count,checksum,verification,status",
  ];
  for (const a of artifacts) {
    lines.push(
      [
        a.artifact_id,
        a.source,
        a.kind,
        a.artifact_name,
        a.artifact_path,
        a.created_at,
        a.size_bytes,
        a.files_count,
        a.checksum,
        a.verification,
        a.status,
      ]
        .map(csvField)
        .join(","),
    );
  }
  return lines.join("\n");
}

function printHelp(): void {
  console.log(`
${color.bold("ged-maintenance list")} - List recorded backup artifacts

${color.dim("USAGE:")}
  ged-maintenance list [OPTIONS]

${color.dim("OPTIONS:")}
  -s, --source <source>   Filter by source: database, files (default: both)
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
      --all               Include artifacts that have been deleted
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  ged-maintenance list
  ged-maintenance list -s database -n 5
  ged-maintenance list --all --format csv
`);
}
