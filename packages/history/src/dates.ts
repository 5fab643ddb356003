import type { CalendarDate } from "./schema.js";

const DAY_MS = 24 * 60 * 60 * 1000;
// year-month-day, optionally followed by a time ("2024-03-05", "2024-3-5T10:00Z")
const YMD = /^(\d{4})-(\d{1,2})-(\d{1,2})(?!\d)/;
// month/day/year ("03/05/2024", "3/5/2024 10:00")
const MDY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?!\d)/;

/**
 * Reduce a date string to its calendar day (YYYY-MM-DD).
 *
 * Accepts year-month-day and month/day/year forms, zero-padded or not.
 * The day is kept as written: any time or offset suffix is ignored and the
 * host time zone never applies. Returns null for other forms and for
 * impossible dates ("2024-02-30").
 */
export function toCalendarDate(v: string): CalendarDate | null {
  const s = v.trim();

  const ymd = YMD.exec(s);
  if (ymd) return calendarDay(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

  const mdy = MDY.exec(s);
  if (mdy) return calendarDay(Number(mdy[3]), Number(mdy[1]), Number(mdy[2]));

  return null;
}

function calendarDay(year: number, month: number, day: number): CalendarDate | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return formatUtcDay(d.getTime());
}

/** Milliseconds at UTC midnight of a canonical calendar date. */
export function dayToUtcMs(day: CalendarDate): number {
  return Date.parse(`${day}T00:00:00.000Z`);
}

export function formatUtcDay(t: number): CalendarDate {
  return new Date(t).toISOString().slice(0, 10);
}

export function addDays(day: CalendarDate, n: number): CalendarDate {
  return formatUtcDay(dayToUtcMs(day) + n * DAY_MS);
}
