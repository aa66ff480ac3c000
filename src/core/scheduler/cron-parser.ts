/**
 * Five-field cron expressions (minute hour day-of-month month day-of-week),
 * the subset both crontab and the schedule validator accept
 */

import { CronExpressionParser } from "cron-parser";

export interface CronSchedule {
  expression: string;
  minute: string;
  hour: string;
  dayOfMonth: string;
  month: string;
  dayOfWeek: string;
}

export function parseCron(expression: string): CronSchedule {
  const fields = expression.trim().split(/\s+/);
  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
  if (
    fields.length !== 5 ||
    minute === undefined ||
    hour === undefined ||
    dayOfMonth === undefined ||
    month === undefined ||
    dayOfWeek === undefined
  ) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on out-of-range values and unknown names
  CronExpressionParser.parse(expression);
  return { expression: fields.join(" "), minute, hour, dayOfMonth, month, dayOfWeek };
}

/**
 * The first `count` run times strictly after `from`
 */
export function getUpcomingRuns(cron: CronSchedule, count: number, from: Date = new Date()): Date[] {
  const interval = CronExpressionParser.parse(cron.expression, { currentDate: from });
  const runs: Date[] = [];
  while (runs.length < count) {
    runs.push(interval.next().toDate());
  }
  return runs;
}

export function getNextRun(cron: CronSchedule, from: Date = new Date()): Date {
  return CronExpressionParser.parse(cron.expression, { currentDate: from }).next().toDate();
}
