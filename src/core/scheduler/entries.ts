/**
 * Crontab lines and Task Scheduler commands for the configured schedules
 */

import type { ScheduleConfig } from "../../types";
import { type CronSchedule, getNextRun, parseCron } from "./cron-parser";

export type SchedulePlatform = "cron" | "windows";

export interface ScheduleEntryOptions {
  /** Directory the command runs from (where .env and the config file live) */
  workdir: string;
  /** Command used to invoke the CLI */
  executable?: string;
  from?: Date;
}

export interface ScheduleEntry {
  name: string;
  cron: string;
  command: string;
  description?: string;
  nextRun: Date;
  /** Crontab line or schtasks command; null when the platform cannot express the expression */
  line: string | null;
}

const WINDOWS_DAYS = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT", "SUN"];

export interface WindowsTrigger {
  schedule: "DAILY" | "WEEKLY";
  day?: string;
  time: string;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function renderCronLine(schedule: ScheduleConfig, options: ScheduleEntryOptions): string {
  const executable = options.executable ?? "ged-maintenance";
  return `${schedule.cron} cd ${shellQuote(options.workdir)} && ${executable} ${schedule.command}`;
}

/**
 * Map a fixed-time daily or single-weekday cron expression onto a
 * Task Scheduler trigger
 */
export function toWindowsTrigger(cron: CronSchedule): WindowsTrigger | null {
  const { minute, hour, dayOfMonth, month, dayOfWeek } = cron;
  if (dayOfMonth !== "*" || month !== "*") return null;
  if (!/^\d{1,2}$/.test(minute) || !/^\d{1,2}$/.test(hour)) return null;

  const time = `${hour.padStart(2, "0")}:${minute.padStart(2, "0")}`;
  if (dayOfWeek === "*") {
    return { schedule: "DAILY", time };
  }
  const day = /^[0-7]$/.test(dayOfWeek) ? WINDOWS_DAYS[Number(dayOfWeek)] : undefined;
  return day ? { schedule: "WEEKLY", day, time } : null;
}

export function renderWindowsTask(
  name: string,
  schedule: ScheduleConfig,
  options: ScheduleEntryOptions,
): string | null {
  const trigger = toWindowsTrigger(parseCron(schedule.cron));
  if (!trigger) return null;

  const executable = options.executable ?? "ged-maintenance";
  const action = `cmd /c cd /d ${options.workdir} && ${executable} ${schedule.command}`;
  const parts = [
    "schtasks /Create",
    `/TN "ged-maintenance\\${name}"`,
    `/TR "${action.replace(/"/g, '\\"')}"`,
    `/SC ${trigger.schedule}`,
  ];
  if (trigger.day) {
    parts.push(`/D ${trigger.day}`);
  }
  parts.push(`/ST ${trigger.time}`);
  return parts.join(" ");
}

export function buildScheduleEntries(
  schedules: Record<string, ScheduleConfig>,
  platform: SchedulePlatform,
  options: ScheduleEntryOptions,
): ScheduleEntry[] {
  return Object.entries(schedules).map(([name, schedule]) => ({
    name,
    cron: schedule.cron,
    command: schedule.command,
    description: schedule.description,
    nextRun: getNextRun(parseCron(schedule.cron), options.from),
    line:
      platform === "cron"
        ? renderCronLine(schedule, options)
        : renderWindowsTask(name, schedule, options),
  }));
}
