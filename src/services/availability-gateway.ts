// ============================================================================
// AVAILABILITY GATEWAY
// Boundary between the sweep search and whatever answers availability queries
// ============================================================================

import type { AvailabilityResult, CapCornLanguage, PartySpec } from "../types/capcorn.types.js";

export interface AvailabilityQuery {
  language: CapCornLanguage;
  hotelId: string;
  arrival: string;
  departure: string;
  party: PartySpec;
}

export interface QueryOptions {
  signal?: AbortSignal;
}

/**
 * One availability lookup for one date range. Implementations reject on any
 * transport, HTTP or decoding failure and have no other observable effects.
 */
export interface AvailabilityGateway {
  queryAvailability(query: AvailabilityQuery, options?: QueryOptions): Promise<AvailabilityResult>;
}
