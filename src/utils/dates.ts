// ============================================================================
// CALENDAR DATE HELPERS
// Stay dates are plain calendar days (YYYY-MM-DD) without a time of day
// ============================================================================

import dayjs from "dayjs";

export const CALENDAR_DATE_FORMAT = "YYYY-MM-DD";

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for well-formed dates that exist in the calendar (rejects 2024-02-30)
 */
export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE_PATTERN.test(value)) return false;
  const parsed = dayjs(value);
  return parsed.isValid() && parsed.format(CALENDAR_DATE_FORMAT) === value;
}

export function toCalendarDate(value: dayjs.Dayjs): string {
  return value.format(CALENDAR_DATE_FORMAT);
}

export function addDays(date: string, days: number): string {
  return toCalendarDate(dayjs(date).add(days, "day"));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return dayjs(to).diff(dayjs(from), "day");
}
