// ============================================================================
// ANALYTICS SERVICE
// In-memory record of searches and reservations since process start
// ============================================================================

import { v4 as uuidv4 } from "uuid";
import { config } from "../config/index.js";

export type AnalyticsEventType = "room_search" | "reservation";

interface AnalyticsEvent {
  id: string;
  timestamp: Date;
  eventType: AnalyticsEventType;
  data: Record<string, unknown>;
  resultsCount?: number;
}

export interface AnalyticsEventView {
  timestamp: string;
  eventType: AnalyticsEventType;
  data: Record<string, unknown>;
  resultsCount?: number;
}

export interface AnalyticsSummary {
  timespanHours: number;
  totalSearches: number;
  totalReservations: number;
  conversionRate: number;
  totalRevenue: number;
  averageBookingValue: number;
  totalRoomsFound: number;
  averageResultsPerSearch: number;
  /** Stay length in nights → number of searches, top five by count */
  popularDurations: Record<string, number>;
  searches: AnalyticsEventView[];
  reservations: AnalyticsEventView[];
}

export interface AnalyticsStats {
  totalSearchesInMemory: number;
  totalReservationsInMemory: number;
  oldestSearch: string | null;
  newestSearch: string | null;
  oldestReservation: string | null;
  newestReservation: string | null;
}

const HOUR_MS = 60 * 60 * 1000;
const POPULAR_DURATIONS_LIMIT = 5;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function numberField(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Bounded event log. Appends are synchronous, so concurrent requests can share
 * one instance: each append runs to completion before another task is scheduled.
 */
export class AnalyticsService {
  private readonly roomSearches: AnalyticsEvent[] = [];
  private readonly reservations: AnalyticsEvent[] = [];

  constructor(
    private readonly maxEvents: number = config.analytics.maxEvents,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Record a room search before it is dispatched; returns the event id
   */
  recordRoomSearch(searchData: Record<string, unknown>): string {
    const event: AnalyticsEvent = {
      id: uuidv4(),
      timestamp: this.clock(),
      eventType: "room_search",
      data: searchData,
      resultsCount: 0,
    };
    this.append(this.roomSearches, event);
    return event.id;
  }

  /**
   * Attach the number of options found to a recorded search
   */
  recordSearchOutcome(eventId: string, resultsCount: number): void {
    const event = this.roomSearches.find((candidate) => candidate.id === eventId);
    if (event) {
      event.resultsCount = resultsCount;
    }
  }

  recordReservation(reservationData: Record<string, unknown>): void {
    this.append(this.reservations, {
      id: uuidv4(),
      timestamp: this.clock(),
      eventType: "reservation",
      data: reservationData,
    });
  }

  getRoomSearches(hours: number): AnalyticsEventView[] {
    return this.since(this.roomSearches, hours).map((event) => ({
      timestamp: event.timestamp.toISOString(),
      eventType: event.eventType,
      data: event.data,
      resultsCount: event.resultsCount,
    }));
  }

  getReservations(hours: number): AnalyticsEventView[] {
    return this.since(this.reservations, hours).map((event) => ({
      timestamp: event.timestamp.toISOString(),
      eventType: event.eventType,
      data: event.data,
    }));
  }

  getSummary(hours: number): AnalyticsSummary {
    const searches = this.getRoomSearches(hours);
    const reservations = this.getReservations(hours);

    const totalSearches = searches.length;
    const totalReservations = reservations.length;
    const totalRevenue = reservations.reduce((sum, r) => sum + numberField(r.data, "totalAmount"), 0);
    const totalRoomsFound = searches.reduce((sum, s) => sum + (s.resultsCount ?? 0), 0);

    const durationCounts = new Map<number, number>();
    for (const search of searches) {
      const duration = numberField(search.data, "duration");
      if (duration > 0) {
        durationCounts.set(duration, (durationCounts.get(duration) ?? 0) + 1);
      }
    }

    const popularDurations = Object.fromEntries(
      [...durationCounts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, POPULAR_DURATIONS_LIMIT)
        .map(([duration, count]) => [String(duration), count])
    );

    return {
      timespanHours: hours,
      totalSearches,
      totalReservations,
      conversionRate: totalSearches > 0 ? round2((totalReservations / totalSearches) * 100) : 0,
      totalRevenue: round2(totalRevenue),
      averageBookingValue: totalReservations > 0 ? round2(totalRevenue / totalReservations) : 0,
      totalRoomsFound,
      averageResultsPerSearch: totalSearches > 0 ? round2(totalRoomsFound / totalSearches) : 0,
      popularDurations,
      searches,
      reservations,
    };
  }

  getStats(): AnalyticsStats {
    return {
      totalSearchesInMemory: this.roomSearches.length,
      totalReservationsInMemory: this.reservations.length,
      oldestSearch: this.roomSearches[0]?.timestamp.toISOString() ?? null,
      newestSearch: this.roomSearches[this.roomSearches.length - 1]?.timestamp.toISOString() ?? null,
      oldestReservation: this.reservations[0]?.timestamp.toISOString() ?? null,
      newestReservation: this.reservations[this.reservations.length - 1]?.timestamp.toISOString() ?? null,
    };
  }

  private append(log: AnalyticsEvent[], event: AnalyticsEvent): void {
    log.push(event);
    if (log.length > this.maxEvents) {
      log.shift();
    }
  }

  private since(log: AnalyticsEvent[], hours: number): AnalyticsEvent[] {
    const cutoff = this.clock().getTime() - hours * HOUR_MS;
    return log.filter((event) => event.timestamp.getTime() >= cutoff);
  }
}
