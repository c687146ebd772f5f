// ============================================================================
// ROOM AVAILABILITY PARSER
// Decodes CapCorn availability XML into member → room → option records
// ============================================================================

import { BaseXmlParser } from "./base.parser.js";
import type {
  AvailabilityMember,
  AvailabilityResult,
  AvailableRoom,
  Child,
  RoomOption,
} from "../types/capcorn.types.js";

export class RoomAvailabilityParser extends BaseXmlParser {
  parse(xml: string): AvailabilityResult {
    const doc = this.parseXml(xml);
    const members = this.getElements(doc, "member").map((el) => this.parseMember(el));
    return { members };
  }

  private parseMember(memberEl: Element): AvailabilityMember {
    return {
      hotelId: this.getAttribute(memberEl, "hotel_id") ?? "",
      rooms: this.getElements(memberEl, "room").map((el) => this.parseRoom(el)),
    };
  }

  private parseRoom(roomEl: Element): AvailableRoom {
    const childrenEl = this.getElement(roomEl, "children");
    const children: Child[] = childrenEl
      ? this.getElements(childrenEl, "child").map((el) => ({
          age: Number.parseInt(this.getAttribute(el, "age") ?? "0", 10) || 0,
        }))
      : [];

    const optionsEl = this.getElement(roomEl, "options");
    const options = optionsEl
      ? this.getElements(optionsEl, "option").map((el) => this.parseOption(el))
      : [];

    return {
      arrival: this.getText(roomEl, "arrival"),
      departure: this.getText(roomEl, "departure"),
      adults: this.getInt(roomEl, "adults", 0),
      children,
      options,
    };
  }

  private parseOption(optionEl: Element): RoomOption {
    return {
      categoryCode: this.getText(optionEl, "catc"),
      typeName: this.getText(optionEl, "type"),
      description: this.getText(optionEl, "description"),
      sizeSqm: this.getInt(optionEl, "size", 0),
      totalPrice: this.getFloat(optionEl, "price", 0),
      pricePerPerson: this.getFloat(optionEl, "price_per_person", 0),
      pricePerAdult: this.getFloat(optionEl, "price_per_adult", 0),
      pricePerNight: this.getFloat(optionEl, "price_per_night", 0),
      boardCode: this.getInt(optionEl, "board", 1),
      roomTypeCode: this.getInt(optionEl, "room_type", 1),
    };
  }
}

export const roomAvailabilityParser = new RoomAvailabilityParser();
