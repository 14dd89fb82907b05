/**
 * Clock and calendar helpers.
 * Times are carried as minutes from midnight; dates as ISO "YYYY-MM-DD" strings.
 */

const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses "HH:MM" into minutes from midnight. Returns null for malformed input.
 */
export function parseClock(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value.trim());
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  if (hours > 23 || minutes > 59) return null;

  return hours * 60 + minutes;
}

/**
 * Formats minutes from midnight as "HH:MM". Values past midnight keep counting hours (e.g. "25:30").
 */
export function formatClock(totalMinutes: number): string {
  const rounded = Math.round(totalMinutes);
  const hours = Math.floor(rounded / 60);
  const minutes = rounded % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * True when value is a real calendar date in "YYYY-MM-DD" form
 */
export function isIsoDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Splits a local ISO datetime ("2026-03-02T14:30" or with seconds) into its date and clock minutes
 */
export function splitLocalDateTime(value: string): { date: string; minutes: number } | null {
  const match = /^(\d{4}-\d{2}-\d{2})[T ](\d{1,2}:\d{2})(?::\d{2}(?:\.\d+)?)?$/.exec(value.trim());
  if (!match || !isIsoDate(match[1])) return null;

  const minutes = parseClock(match[2]);
  if (minutes === null) return null;

  return { date: match[1], minutes };
}
