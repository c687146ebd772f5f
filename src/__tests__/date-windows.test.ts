import { describe, it, expect } from "vitest";
import { enumerateDateWindows, timespanWidth } from "../utils/date-windows.js";
import { daysBetween } from "../utils/dates.js";
import { InvalidRangeError } from "../errors/index.js";

describe("enumerateDateWindows", () => {
  it("slides a 4-night stay across a week", () => {
    const windows = enumerateDateWindows({ from: "2024-01-01", to: "2024-01-08" }, 4);

    expect(windows).toEqual([
      { arrival: "2024-01-01", departure: "2024-01-05" },
      { arrival: "2024-01-02", departure: "2024-01-06" },
      { arrival: "2024-01-03", departure: "2024-01-07" },
      { arrival: "2024-01-04", departure: "2024-01-08" },
    ]);
  });

  it("yields width - duration + 1 windows of exactly `duration` days", () => {
    const timespan = { from: "2024-03-10", to: "2024-03-24" };
    const width = timespanWidth(timespan);

    for (let duration = 1; duration <= width; duration++) {
      const windows = enumerateDateWindows(timespan, duration);

      expect(windows).toHaveLength(width - duration + 1);
      for (const window of windows) {
        expect(daysBetween(window.arrival, window.departure)).toBe(duration);
        expect(window.arrival >= timespan.from).toBe(true);
        expect(window.departure <= timespan.to).toBe(true);
      }
      for (let i = 1; i < windows.length; i++) {
        expect(daysBetween(windows[i - 1]?.arrival ?? "", windows[i]?.arrival ?? "")).toBe(1);
      }
    }
  });

  it("returns a single window covering the timespan when duration equals width", () => {
    expect(enumerateDateWindows({ from: "2024-06-01", to: "2024-06-08" }, 7)).toEqual([
      { arrival: "2024-06-01", departure: "2024-06-08" },
    ]);
  });

  it("crosses month ends and leap days", () => {
    expect(enumerateDateWindows({ from: "2024-02-27", to: "2024-03-02" }, 2)).toEqual([
      { arrival: "2024-02-27", departure: "2024-02-29" },
      { arrival: "2024-02-28", departure: "2024-03-01" },
      { arrival: "2024-02-29", departure: "2024-03-02" },
    ]);
  });

  it("rejects a duration longer than the timespan", () => {
    expect(() => enumerateDateWindows({ from: "2024-01-01", to: "2024-01-08" }, 8)).toThrow(
      InvalidRangeError
    );
  });

  it("rejects zero and fractional durations", () => {
    const timespan = { from: "2024-01-01", to: "2024-01-08" };
    expect(() => enumerateDateWindows(timespan, 0)).toThrow(InvalidRangeError);
    expect(() => enumerateDateWindows(timespan, 1.5)).toThrow(InvalidRangeError);
  });

  it("rejects reversed, empty and non-calendar timespans", () => {
    expect(() => enumerateDateWindows({ from: "2024-01-08", to: "2024-01-01" }, 1)).toThrow(
      "'to' date must be after 'from' date"
    );
    expect(() => enumerateDateWindows({ from: "2024-01-01", to: "2024-01-01" }, 1)).toThrow(
      InvalidRangeError
    );
    expect(() => enumerateDateWindows({ from: "2024-02-30", to: "2024-03-05" }, 1)).toThrow(
      InvalidRangeError
    );
  });
});
