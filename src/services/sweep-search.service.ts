// ============================================================================
// SWEEP SEARCH SERVICE
// Queries every date window of a timespan concurrently and merges the answers
// ============================================================================

import { config } from "../config/index.js";
import { NoWindowsError, SearchCancelledError, WindowQueryError } from "../errors/index.js";
import { enumerateDateWindows } from "../utils/date-windows.js";
import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import type { AvailabilityGateway } from "./availability-gateway.js";
import type {
  AvailabilityResult,
  CapCornLanguage,
  PartySpec,
  SearchLanguage,
} from "../types/capcorn.types.js";
import type {
  DateWindow,
  DatedRoomOption,
  SweepResult,
  SweepSearchInput,
  WindowOutcome,
} from "../types/sweep.types.js";

export interface SweepSearchOptions {
  /** Aborting cancels every in-flight window query */
  signal?: AbortSignal;
}

export function toCapCornLanguage(language: SearchLanguage): CapCornLanguage {
  return language === "de" ? 0 : 1;
}

/**
 * Flatten member → room → option into options tagged with their window,
 * keeping the order in which CapCorn listed them
 */
export function flattenAvailability(result: AvailabilityResult, window: DateWindow): DatedRoomOption[] {
  const options: DatedRoomOption[] = [];
  for (const member of result.members) {
    for (const room of member.rooms) {
      for (const option of room.options) {
        options.push({ arrival: window.arrival, departure: window.departure, ...option });
      }
    }
  }
  return options;
}

/**
 * Fold window outcomes (already in window order) into a sweep result.
 * Failed windows add nothing to `options` but still count as issued queries.
 */
export function aggregateOutcomes(outcomes: WindowOutcome[], durationDays: number): SweepResult {
  const options: DatedRoomOption[] = [];
  let failedQueries = 0;

  const windows = outcomes.map((outcome) => {
    if (outcome.status === "ok") {
      options.push(...outcome.options);
      return {
        arrival: outcome.window.arrival,
        departure: outcome.window.departure,
        status: outcome.status,
        optionCount: outcome.options.length,
      };
    }

    failedQueries++;
    return {
      arrival: outcome.window.arrival,
      departure: outcome.window.departure,
      status: outcome.status,
      optionCount: 0,
      error: outcome.error.message,
    };
  });

  return {
    totalQueriesIssued: outcomes.length,
    totalOptionsFound: options.length,
    failedQueries,
    durationDays,
    options,
    windows,
  };
}

export class SweepSearchService {
  constructor(
    private readonly gateway: AvailabilityGateway,
    private readonly hotelId: string = config.capcorn.hotelId
  ) {}

  /**
   * Search every `duration`-night stay inside the timespan.
   *
   * All window queries start at once (no concurrency cap: N windows means N
   * simultaneous upstream calls) and the method waits for every one of them to
   * settle. A failed window contributes no options; the search itself only
   * fails before dispatch or when cancelled.
   */
  async search(input: SweepSearchInput, options: SweepSearchOptions = {}): Promise<SweepResult> {
    const { signal } = options;
    const startTime = Date.now();

    const windows = enumerateDateWindows(input.timespan, input.duration);
    if (windows.length === 0) {
      throw new NoWindowsError({ timespan: input.timespan, duration: input.duration });
    }

    if (signal?.aborted) {
      throw new SearchCancelledError();
    }

    const language = toCapCornLanguage(input.language);
    const outcomes = await Promise.all(
      windows.map((window) => this.queryWindow(window, language, input.party, signal))
    );

    if (signal?.aborted) {
      throw new SearchCancelledError();
    }

    const result = aggregateOutcomes(outcomes, input.duration);

    metrics.recordSweep(
      result.totalQueriesIssued - result.failedQueries,
      result.failedQueries,
      result.totalOptionsFound
    );
    logger.sweep({
      durationDays: result.durationDays,
      totalQueries: result.totalQueriesIssued,
      failedQueries: result.failedQueries,
      totalOptions: result.totalOptionsFound,
      duration: Date.now() - startTime,
      windows: result.windows,
    });

    return result;
  }

  private async queryWindow(
    window: DateWindow,
    language: CapCornLanguage,
    party: PartySpec,
    signal: AbortSignal | undefined
  ): Promise<WindowOutcome> {
    try {
      const availability = await this.gateway.queryAvailability(
        {
          language,
          hotelId: this.hotelId,
          arrival: window.arrival,
          departure: window.departure,
          party,
        },
        { signal }
      );
      return { status: "ok", window, options: flattenAvailability(availability, window) };
    } catch (error) {
      const failure = new WindowQueryError(window.arrival, window.departure, error);
      logger.warn(
        {
          type: "window_query_failed",
          arrival: window.arrival,
          departure: window.departure,
          reasonCode: failure.details?.reasonCode,
        },
        failure.message
      );
      return { status: "error", window, error: failure };
    }
  }
}
