// ============================================================================
// DATE WINDOW ENUMERATION
// Slides a fixed-length stay across a timespan, one day at a time
// ============================================================================

import { InvalidRangeError } from "../errors/index.js";
import type { DateWindow, Timespan } from "../types/sweep.types.js";
import { addDays, daysBetween, isCalendarDate } from "./dates.js";

/**
 * Number of days between `timespan.from` and `timespan.to`
 */
export function timespanWidth(timespan: Timespan): number {
  return daysBetween(timespan.from, timespan.to);
}

/**
 * Every (arrival, departure) pair of `duration` nights inside the timespan,
 * ascending by arrival. Yields `width - duration + 1` windows.
 *
 * @throws InvalidRangeError when the timespan is empty or reversed, or the
 *   duration is not a whole number of days between 1 and the timespan width
 */
export function enumerateDateWindows(timespan: Timespan, duration: number): DateWindow[] {
  if (!isCalendarDate(timespan.from) || !isCalendarDate(timespan.to)) {
    throw new InvalidRangeError("Timespan dates must be valid YYYY-MM-DD calendar dates", {
      from: timespan.from,
      to: timespan.to,
    });
  }

  if (!Number.isInteger(duration) || duration < 1) {
    throw new InvalidRangeError(`Duration must be a positive whole number of days, got ${duration}`, {
      duration,
    });
  }

  const width = timespanWidth(timespan);
  if (width <= 0) {
    throw new InvalidRangeError("'to' date must be after 'from' date", {
      from: timespan.from,
      to: timespan.to,
    });
  }

  if (duration > width) {
    throw new InvalidRangeError(`Duration (${duration} days) cannot exceed timespan (${width} days)`, {
      duration,
      width,
    });
  }

  const windows: DateWindow[] = [];
  for (let offset = 0; offset <= width - duration; offset++) {
    const arrival = addDays(timespan.from, offset);
    windows.push({ arrival, departure: addDays(arrival, duration) });
  }

  return windows;
}
