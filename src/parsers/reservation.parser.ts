// ============================================================================
// RESERVATION RESPONSE PARSER
// Reads OTA_HotelResNotifRS for <Errors>; a 2xx body without readable XML
// (empty or plain text) counts as accepted
// ============================================================================

import { XmlParseError } from "../errors/index.js";
import { BaseXmlParser } from "./base.parser.js";

export interface ReservationResponseData {
  success: boolean;
  errors: string[];
  /** False when the body carried no XML to inspect */
  readable: boolean;
}

export class ReservationResponseParser extends BaseXmlParser {
  parse(xml: string): ReservationResponseData {
    if (xml.trim() === "") {
      return { success: true, errors: [], readable: false };
    }

    let doc: Document;
    try {
      doc = this.parseXml(xml);
    } catch (error) {
      if (error instanceof XmlParseError) {
        return { success: true, errors: [], readable: false };
      }
      throw error;
    }

    const errors = this.getElements(doc, "Error").map(
      (el) =>
        this.getAttribute(el, "ShortText") ||
        el.textContent?.trim() ||
        this.getAttribute(el, "Code") ||
        "Unknown error"
    );

    return { success: errors.length === 0, errors, readable: true };
  }
}

export const reservationResponseParser = new ReservationResponseParser();
