export { type CronSchedule, getNextRun, getUpcomingRuns, parseCron } from "./cron-parser";
export {
  buildScheduleEntries,
  renderCronLine,
  renderWindowsTask,
  type ScheduleEntry,
  type ScheduleEntryOptions,
  type SchedulePlatform,
  toWindowsTrigger,
  type WindowsTrigger,
} from "./entries";
