const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Whole days elapsed between `date` and `now`, rounded down.
 * Both are absolute instants, so the result is the same in every timezone.
 */
export function daysSince(date: Date, now: Date = new Date()): number {
  return Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY);
}

/** Strictly more than `threshold` days counts as stale; exactly `threshold` does not. */
export function isStale(daysInactive: number, threshold: number): boolean {
  return daysInactive > threshold;
}

// A date-time without `Z` or an offset; `Date` would read it in the local zone.
const FLOATING_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Parse ISO-8601 text into an instant, or null if the text is not a date.
 * Date-times without an offset are read as UTC.
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  const floating = FLOATING_DATE_TIME.exec(trimmed);
  const date = new Date(floating ? `${floating[1]}T${floating[2]}Z` : trimmed);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Calendar date (YYYY-MM-DD) of an instant, in UTC. */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
