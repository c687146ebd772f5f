// ============================================================================
// BUILDER EXPORTS
// ============================================================================

export {
  XML_DECLARATION,
  OTA_NAMESPACES,
  escapeXml,
  formatAmount,
  formatDateTime,
  optional,
} from "./base.builder.js";
export { buildRoomAvailabilityXml } from "./room-availability.builder.js";
export { buildReservationXml, type ReservationBuildOptions } from "./reservation.builder.js";
