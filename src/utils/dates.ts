const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar day (UTC) as YYYY-MM-DD
 */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYY-MM-DD for the day a number of days before now
 */
export function daysAgo(now: Date, days: number): string {
  return isoDay(new Date(now.getTime() - days * DAY_MS));
}

/**
 * Whole calendar days from today to a YYYY-MM-DD date; negative once past,
 * null when the value is not a date
 */
export function daysUntil(day: string | null | undefined, now: Date): number | null {
  if (!day) {
    return null;
  }
  const match = ISO_DAY.exec(day.trim().slice(0, 10));
  if (!match) {
    return null;
  }
  const target = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  if (isNaN(target)) {
    return null;
  }
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((target - today) / DAY_MS);
}
