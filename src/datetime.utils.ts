import type { DateRange, TimeOfDay } from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const MINUTES_PER_HOUR = 60;

/**
 * Formats a date as YYYY-MM-DD string (local calendar day).
 *
 * Day keys are how bookings are compared: two timestamps on the same local
 * calendar day produce the same key.
 */
export function formatDateString(date: Date): string {
  const year = date.getFullYear();
  const month = (date.getMonth() + 1).toString().padStart(2, "0");
  const day = date.getDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 * Only used for calendar arithmetic, never for display.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Returns a new Date at local midnight of the given date.
 */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * Returns a new Date shifted by whole calendar days (local time, DST-safe).
 */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date);
  result.setDate(result.getDate() + days);
  return result;
}

/**
 * Number of calendar days from `from` to `to` (negative when `to` is earlier).
 * Time of day is ignored.
 *
 * @example
 * ```typescript
 * daysBetween(new Date(2030, 0, 1, 23, 0), new Date(2030, 0, 3, 1, 0)); // 2
 * ```
 */
export function daysBetween(from: Date, to: Date): number {
  const a = parseDayString(formatDateString(from));
  const b = parseDayString(formatDateString(to));
  return Math.round((b.getTime() - a.getTime()) / MS_PER_DAY);
}

export function isSameDay(a: Date, b: Date): boolean {
  return formatDateString(a) === formatDateString(b);
}

/**
 * True when `date` falls on a calendar day before `now`'s day.
 * Today itself is not in the past.
 */
export function isBeforeToday(date: Date, now: Date = new Date()): boolean {
  return formatDateString(date) < formatDateString(now);
}

/**
 * Generates an array of day strings (YYYY-MM-DD) from a date range.
 *
 * @param range - The range with start (inclusive) and end (inclusive) dates
 * @returns Array of day strings in YYYY-MM-DD format
 *
 * @example
 * ```typescript
 * const days = generateDays({
 *   start: new Date(2025, 0, 1),
 *   end: new Date(2025, 0, 4),
 * });
 * // Returns: ["2025-01-01", "2025-01-02", "2025-01-03", "2025-01-04"]
 * ```
 */
export function generateDays(range: DateRange): string[] {
  const days: string[] = [];
  const last = formatDateString(range.end);
  let current = startOfDay(range.start);

  while (formatDateString(current) <= last) {
    days.push(formatDateString(current));
    current = addDays(current, 1);
  }

  return days;
}

export function timeOfDayToMinutes(time: TimeOfDay): number {
  return time.hours * MINUTES_PER_HOUR + time.minutes;
}

export function minutesToTimeOfDay(totalMinutes: number): TimeOfDay {
  return {
    hours: Math.floor(totalMinutes / MINUTES_PER_HOUR),
    minutes: totalMinutes % MINUTES_PER_HOUR,
  };
}

/**
 * Formats a time of day on a 12-hour clock, e.g. `"8:00 AM"` or `"5:30 PM"`.
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const suffix = time.hours < 12 ? "AM" : "PM";
  const hours12 = time.hours % 12 === 0 ? 12 : time.hours % 12;
  return `${hours12}:${time.minutes.toString().padStart(2, "0")} ${suffix}`;
}
