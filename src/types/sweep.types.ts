// ============================================================================
// SWEEP SEARCH TYPES
// ============================================================================

import type { PartySpec, RoomOption, SearchLanguage } from "./capcorn.types.js";

/** Dates are calendar days in YYYY-MM-DD form */
export interface Timespan {
  from: string;
  to: string;
}

export interface DateWindow {
  readonly arrival: string;
  readonly departure: string;
}

export type DatedRoomOption = DateWindow & RoomOption;

export interface SweepSearchInput {
  language: SearchLanguage;
  timespan: Timespan;
  duration: number;
  party: PartySpec;
}

/** Outcome of the availability query for a single window */
export type WindowOutcome =
  | { status: "ok"; window: DateWindow; options: DatedRoomOption[] }
  | { status: "error"; window: DateWindow; error: Error };

export interface WindowSummary {
  arrival: string;
  departure: string;
  status: WindowOutcome["status"];
  optionCount: number;
  error?: string;
}

export interface SweepResult {
  totalQueriesIssued: number;
  totalOptionsFound: number;
  failedQueries: number;
  durationDays: number;
  options: DatedRoomOption[];
  windows: WindowSummary[];
}
