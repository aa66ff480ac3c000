/**
 * Retention policy logic
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Instant before which an item has outlived `thresholdDays`
 */
export function getCutoffDate(now: Date, thresholdDays: number): Date {
  return new Date(now.getTime() - thresholdDays * DAY_MS);
}

/**
 * True when strictly more than `thresholdDays` separate `timestamp` from `now`
 */
export function isOlderThan(timestamp: Date, now: Date, thresholdDays: number): boolean {
  return now.getTime() - timestamp.getTime() > thresholdDays * DAY_MS;
}

/**
 * Items eligible for cleanup, oldest first. Order among equal timestamps
 * follows the input.
 */
export function selectCandidates<T>(
  items: readonly T[],
  now: Date,
  thresholdDays: number,
  timestampOf: (item: T) => Date,
): T[] {
  return items
    .filter((item) => isOlderThan(timestampOf(item), now, thresholdDays))
    .sort((a, b) => timestampOf(a).getTime() - timestampOf(b).getTime());
}

export function daysBetween(earlier: Date, later: Date): number {
  return Math.floor((later.getTime() - earlier.getTime()) / DAY_MS);
}
