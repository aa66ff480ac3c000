import * as path from "node:path";
import { parseArgs } from "node:util";
import { buildScheduleEntries, errorMessage, type SchedulePlatform } from "../../core";
import { formatDateTime } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, loadCommandConfig } from "../context";
import { color, ui } from "../ui";

function isPlatform(value: string): value is SchedulePlatform {
  return value === "cron" || value === "windows";
}

export async function scheduleCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      platform: { type: "string", short: "p" },
      workdir: { type: "string", short: "w" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const platform = values.platform ?? (process.platform === "win32" ? "windows" : "cron");
  if (!isPlatform(platform)) {
    ui.error(`Unknown platform: ${platform} (expected cron or windows)`);
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    const workdir = path.resolve(values.workdir ?? process.cwd());
    const entries = buildScheduleEntries(config.schedules, platform, { workdir });

    if (entries.length === 0) {
      ui.info("No schedules configured");
      return 0;
    }

    let unsupported = 0;
    for (const entry of entries) {
      const header = `# ${entry.name}: ${entry.description ?? entry.command} (next run ${formatDateTime(entry.nextRun)})`;
      console.log(color.dim(header));
      if (entry.line) {
        console.log(entry.line);
      } else {
        unsupported++;
        console.log(color.yellow(`# "${entry.cron}" cannot be expressed as a Task Scheduler trigger`));
      }
    }

    return unsupported > 0 ? 1 : 0;
  } catch (error) {
    ui.error(`Schedule failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("ged-maintenance schedule")} - Print scheduler entries for the configured schedules

${color.dim("USAGE:")}
  ged-maintenance schedule [OPTIONS]

${color.dim("OPTIONS:")}
  -p, --platform <name>   cron or windows (default: this machine's)
  -w, --workdir <path>    Directory the jobs run from (default: current directory)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  ged-maintenance schedule >> /etc/cron.d/ged-maintenance
  ged-maintenance schedule --platform windows --workdir C:\\ged
`);
}
