/**
 * Human-readable formatting helpers
 */

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"];

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return "0 B";
  const k = 1024;
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), BYTE_UNITS.length - 1);
  return `${parseFloat((bytes / k ** i).toFixed(2))} ${BYTE_UNITS[i]}`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds % 60);
  return `${minutes}m ${rest}s`;
}

/**
 * Percentage of space saved by compression, 0 when the source is empty
 */
export function compressionRatio(sourceBytes: number, archiveBytes: number): number {
  if (sourceBytes <= 0) return 0;
  return (1 - archiveBytes / sourceBytes) * 100;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local date-time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Local date as `YYYY-MM-DD`
 */
export function formatDate(date: Date): string {
  return formatDateTime(date).slice(0, 10);
}
