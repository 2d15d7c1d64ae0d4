export const MS_PER_DAY = 86_400_000;

/**
 * Whole days elapsed between an ISO timestamp and `now`, floored.
 * Both sides are compared as UTC epoch milliseconds.
 */
export function daysSince(timestamp: string, now: Date): number {
  return Math.floor((now.getTime() - Date.parse(timestamp)) / MS_PER_DAY);
}

/** YYYY-MM-DD for the UTC calendar day of `date`. */
export function utcDate(date: Date): string {
  return date.toISOString().split("T")[0];
}
