// ============================================================================
// PARSER EXPORTS
// ============================================================================

export { BaseXmlParser } from "./base.parser.js";
export { RoomAvailabilityParser, roomAvailabilityParser } from "./room-availability.parser.js";
export {
  ReservationResponseParser,
  reservationResponseParser,
  type ReservationResponseData,
} from "./reservation.parser.js";
