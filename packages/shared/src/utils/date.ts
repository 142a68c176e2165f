/**
 * Trading-date helpers
 *
 * Trading dates are plain `YYYY-MM-DD` strings interpreted in UTC so that a
 * run replays identically regardless of the host time zone.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Midnight UTC of a trading date, in milliseconds
 */
export function parseTradingDate(date: string): number {
  const ms = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid trading date: ${date}`);
  }
  return ms;
}

/**
 * Trading date (UTC) of a millisecond timestamp
 */
export function toTradingDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

export function addDays(date: string, days: number): string {
  return toTradingDate(parseTradingDate(date) + days * MS_PER_DAY);
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseTradingDate(to) - parseTradingDate(from)) / MS_PER_DAY);
}

/**
 * Every calendar date in [start, end], inclusive
 */
export function dateRange(start: string, end: string): string[] {
  const dates: string[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
