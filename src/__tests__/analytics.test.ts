import { describe, it, expect } from "vitest";
import { AnalyticsService } from "../services/analytics.service.js";

function clockAt(iso: string) {
  let now = new Date(iso);
  return {
    now: () => now,
    advanceHours: (hours: number) => {
      now = new Date(now.getTime() + hours * 60 * 60 * 1000);
    },
  };
}

describe("AnalyticsService", () => {
  it("summarises searches and reservations", () => {
    const clock = clockAt("2024-05-01T12:00:00.000Z");
    const analytics = new AnalyticsService(100, clock.now);

    const first = analytics.recordRoomSearch({ duration: 3 });
    analytics.recordSearchOutcome(first, 10);
    analytics.recordRoomSearch({ duration: 3 });
    const third = analytics.recordRoomSearch({ duration: 5 });
    analytics.recordSearchOutcome(third, 5);
    analytics.recordReservation({ totalAmount: 300 });
    analytics.recordReservation({ totalAmount: 150.5 });

    const summary = analytics.getSummary(24);

    expect(summary).toMatchObject({
      timespanHours: 24,
      totalSearches: 3,
      totalReservations: 2,
      conversionRate: 66.67,
      totalRevenue: 450.5,
      averageBookingValue: 225.25,
      totalRoomsFound: 15,
      averageResultsPerSearch: 5,
      popularDurations: { "3": 2, "5": 1 },
    });
    expect(summary.searches[0]).toEqual({
      timestamp: "2024-05-01T12:00:00.000Z",
      eventType: "room_search",
      data: { duration: 3 },
      resultsCount: 10,
    });
  });

  it("reports zeros when nothing happened", () => {
    const summary = new AnalyticsService(100).getSummary(24);

    expect(summary.conversionRate).toBe(0);
    expect(summary.averageBookingValue).toBe(0);
    expect(summary.averageResultsPerSearch).toBe(0);
    expect(summary.popularDurations).toEqual({});
  });

  it("only returns events inside the requested window", () => {
    const clock = clockAt("2024-05-01T08:00:00.000Z");
    const analytics = new AnalyticsService(100, clock.now);

    analytics.recordRoomSearch({ duration: 2 });
    clock.advanceHours(3);
    analytics.recordRoomSearch({ duration: 4 });

    expect(analytics.getRoomSearches(1).map((e) => e.data)).toEqual([{ duration: 4 }]);
    expect(analytics.getRoomSearches(24)).toHaveLength(2);
  });

  it("keeps only the newest events once full", () => {
    const clock = clockAt("2024-05-01T08:00:00.000Z");
    const analytics = new AnalyticsService(2, clock.now);

    analytics.recordRoomSearch({ duration: 1 });
    clock.advanceHours(1);
    analytics.recordRoomSearch({ duration: 2 });
    clock.advanceHours(1);
    analytics.recordRoomSearch({ duration: 3 });

    expect(analytics.getStats()).toEqual({
      totalSearchesInMemory: 2,
      totalReservationsInMemory: 0,
      oldestSearch: "2024-05-01T09:00:00.000Z",
      newestSearch: "2024-05-01T10:00:00.000Z",
      oldestReservation: null,
      newestReservation: null,
    });
  });

  it("ignores outcomes for unknown searches", () => {
    const analytics = new AnalyticsService(100);
    analytics.recordRoomSearch({ duration: 2 });
    analytics.recordSearchOutcome("missing", 7);

    expect(analytics.getSummary(24).totalRoomsFound).toBe(0);
  });
});
