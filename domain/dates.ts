/**
 * Date-only helpers (YYYY-MM-DD). All arithmetic is in calendar days.
 */

import {
  addDays,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  getDate,
  isMonday,
  isValid,
  parseISO,
} from "date-fns";
import type { DateOnly } from "./core.js";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_FORMAT = "yyyy-MM-dd";

/** True for a well-formed string naming a real calendar day. */
export function isDateOnly(value: string): value is DateOnly {
  if (!DATE_ONLY.test(value)) return false;
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

export function toDateOnly(date: Date): DateOnly {
  return format(date, DATE_FORMAT);
}

/** Calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: DateOnly, to: DateOnly): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function shiftDays(date: DateOnly, days: number): DateOnly {
  return toDateOnly(addDays(parseISO(date), days));
}

/** Every day from start to end, inclusive. Empty when end < start. */
export function eachDay(start: DateOnly, end: DateOnly): DateOnly[] {
  if (end < start) return [];
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(toDateOnly);
}

export function minDate(a: DateOnly, b: DateOnly): DateOnly {
  return a <= b ? a : b;
}

export function maxDate(a: DateOnly, b: DateOnly): DateOnly {
  return a >= b ? a : b;
}

/** date-fns `format` pattern applied to a date-only value, e.g. "MMM d". */
export function formatDay(date: DateOnly, pattern: string): string {
  return format(parseISO(date), pattern);
}

export function isWeekStart(date: DateOnly): boolean {
  return isMonday(parseISO(date));
}

export function isMonthStart(date: DateOnly): boolean {
  return getDate(parseISO(date)) === 1;
}
