// ============================================================================
// ROOM AVAILABILITY XML BUILDER
// ============================================================================

import { escapeXml } from "./base.builder.js";
import type { PartySpec, RoomAvailabilityRequest } from "../types/capcorn.types.js";

function buildRoom(room: PartySpec): string {
  if (room.children.length === 0) {
    return `
    <room adults="${escapeXml(room.adults)}"/>`;
  }

  const children = room.children
    .map((child) => `
      <child age="${escapeXml(child.age)}"/>`)
    .join("");

  return `
    <room adults="${escapeXml(room.adults)}">${children}
    </room>`;
}

export function buildRoomAvailabilityXml(input: RoomAvailabilityRequest): string {
  const rooms = input.rooms.map(buildRoom).join("");

  const xml = `
<room_availability>
  <language>${escapeXml(input.language)}</language>
  <members>
    <member hotel_id="${escapeXml(input.hotelId)}"/>
  </members>
  <arrival>${escapeXml(input.arrival)}</arrival>
  <departure>${escapeXml(input.departure)}</departure>
  <rooms>${rooms}
  </rooms>
</room_availability>`;

  return xml.trim();
}
