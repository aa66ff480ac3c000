/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const select = p.select;
export const isCancel = p.isCancel;

/**
 * Prompts only make sense when a person is at the terminal; cron and Task
 * Scheduler runs have no TTY
 */
export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}
