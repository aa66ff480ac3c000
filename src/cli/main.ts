/**
 * Command dispatch
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./commands/backup";
import { cleanupCommand } from "./commands/cleanup";
import { listCommand } from "./commands/list";
import { scheduleCommand } from "./commands/schedule";
import { verifyCommand } from "./commands/verify";
import { LOGO, NAME, VERSION } from "./ui";

export function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Backup and cleanup for Sistema GED`);

  p.note(
    `${color.cyan("backup")}      Back up the database and/or uploaded documents
${color.cyan("cleanup")}     Purge trash, reset tokens, audit logs or old backups
${color.cyan("list")}        List recorded backups
${color.cyan("verify")}      Re-check recorded backups
${color.cyan("schedule")}    Print crontab / Task Scheduler entries`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `${NAME} backup all                ${color.dim("# Database, then files")}
${NAME} cleanup all --dry-run     ${color.dim("# Preview trash, token and audit log cleanup")}
${NAME} cleanup backups           ${color.dim("# Prune expired backups")}
${NAME} list --format json        ${color.dim("# Catalog as JSON")}
${NAME} verify --all              ${color.dim("# Re-check every backup")}
${NAME} schedule                  ${color.dim("# Crontab lines for the configured schedules")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "schedule":
      return scheduleCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return 1;
  }
}
