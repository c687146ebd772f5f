import { describe, it, expect } from "vitest";
import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { CapCornClient, type CapCornSettings } from "../services/capcorn-client.service.js";
import { HttpClientService } from "../services/http-client.service.js";
import {
  UpstreamApiError,
  UpstreamConnectionError,
  UpstreamTimeoutError,
  XmlParseError,
} from "../errors/index.js";
import type { ReservationRequest } from "../types/capcorn.types.js";

const settings: CapCornSettings = {
  baseUrl: "http://capcorn.test/RestService",
  system: "test-system",
  user: "test-user",
  password: "test-secret",
  pin: "test-pin",
  requestTimeout: 1000,
  endpoints: {
    roomAvailability: "/RoomAvailability",
    reservation: "/OTA_HotelResNotifRQ",
  },
};

const AVAILABILITY_XML = `<room_availability>
  <members>
    <member hotel_id="9100">
      <room>
        <arrival>2024-01-01</arrival>
        <departure>2024-01-05</departure>
        <adults>2</adults>
        <options>
          <option><catc>DZ</catc><type>Doppelzimmer</type><price>480</price></option>
        </options>
      </room>
    </member>
  </members>
</room_availability>`;

type Reply = { status: number; body: string } | AxiosError;

/**
 * In-process axios transport answering every request with `reply`
 */
function fakeTransport(reply: (config: InternalAxiosRequestConfig) => Reply) {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const answer = reply(config);
    if (answer instanceof AxiosError) {
      throw answer;
    }

    const response = {
      data: answer.body,
      status: answer.status,
      statusText: String(answer.status),
      headers: {},
      config,
    };
    if (answer.status >= 400) {
      throw new AxiosError(`Request failed with status code ${answer.status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };

  const client = new CapCornClient(
    settings,
    new HttpClientService({ baseURL: settings.baseUrl, timeout: settings.requestTimeout, adapter })
  );
  return { client, requests };
}

const reservation: ReservationRequest = {
  hotelId: "9100",
  roomTypeCode: "DZ",
  numberOfUnits: 1,
  mealPlan: 1,
  guestCounts: [{ ageQualifyingCode: 10, count: 2 }],
  arrival: "2024-01-01",
  departure: "2024-01-05",
  totalAmount: 480,
  guest: {
    namePrefix: "Herr",
    givenName: "Max",
    surname: "Muster",
    phoneNumber: "+43 000 000000",
    email: "guest@example.com",
    address: { addressLine: "Weg 2", cityName: "Graz", postalCode: "8010", countryCode: "AT" },
  },
  services: [],
  reservationId: "RES-9",
  source: "Hackathon",
};

describe("CapCornClient", () => {
  describe("queryAvailability", () => {
    it("posts the availability XML with credentials as query parameters", async () => {
      const { client, requests } = fakeTransport(() => ({ status: 200, body: AVAILABILITY_XML }));

      const result = await client.queryAvailability({
        language: 1,
        hotelId: "9100",
        arrival: "2024-01-01",
        departure: "2024-01-05",
        party: { adults: 2, children: [] },
      });

      expect(requests).toHaveLength(1);
      const request = requests[0];
      expect(request?.method).toBe("post");
      expect(request?.url).toBe("/RoomAvailability");
      expect(request?.params).toEqual({ user: "test-user", password: "test-secret", system: "test-system" });
      expect(request?.headers.get("Content-Type")).toBe("application/xml");
      expect(request?.data).toContain('<member hotel_id="9100"/>');
      expect(request?.data).toContain("<language>1</language>");

      expect(result.members[0]?.rooms[0]?.options[0]?.categoryCode).toBe("DZ");
      expect(result.members[0]?.rooms[0]?.options[0]?.totalPrice).toBe(480);
    });

    it("maps HTTP failures to UpstreamApiError", async () => {
      const { client } = fakeTransport(() => ({ status: 503, body: "maintenance" }));

      const failure = client.queryAvailability({
        language: 0,
        hotelId: "9100",
        arrival: "2024-01-01",
        departure: "2024-01-05",
        party: { adults: 2, children: [] },
      });

      await expect(failure).rejects.toBeInstanceOf(UpstreamApiError);
      await expect(failure).rejects.toMatchObject({
        statusCode: 502,
        retryable: true,
        details: { upstreamStatus: 503, responseBody: "maintenance" },
      });
    });

    it("maps timeouts and connection failures", async () => {
      const query = {
        language: 0 as const,
        hotelId: "9100",
        arrival: "2024-01-01",
        departure: "2024-01-05",
        party: { adults: 2, children: [] },
      };

      const timedOut = fakeTransport(
        (config) => new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED", config)
      );
      await expect(timedOut.client.queryAvailability(query)).rejects.toBeInstanceOf(UpstreamTimeoutError);

      const refused = fakeTransport((config) => new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config));
      await expect(refused.client.queryAvailability(query)).rejects.toBeInstanceOf(UpstreamConnectionError);
    });

    it("rejects unparseable answers", async () => {
      const { client } = fakeTransport(() => ({ status: 200, body: "<<garbage" }));

      await expect(
        client.queryAvailability({
          language: 0,
          hotelId: "9100",
          arrival: "2024-01-01",
          departure: "2024-01-05",
          party: { adults: 2, children: [] },
        })
      ).rejects.toBeInstanceOf(XmlParseError);
    });
  });

  describe("createReservation", () => {
    it("posts to the reservation endpoint with hotel id and pin", async () => {
      const { client, requests } = fakeTransport(() => ({ status: 200, body: "" }));

      const result = await client.createReservation(reservation);

      expect(requests[0]?.url).toBe("/OTA_HotelResNotifRQ");
      expect(requests[0]?.params).toEqual({ hotelId: "9100", pin: "test-pin" });
      expect(requests[0]?.data).toContain("<OTA_HotelResNotifRQ");
      expect(result).toEqual({
        success: true,
        message: "Reservation created successfully",
        reservationId: "RES-9",
      });
    });

    it("reports errors listed in the answer", async () => {
      const { client } = fakeTransport(() => ({
        status: 200,
        body: '<OTA_HotelResNotifRS><Errors><Error ShortText="Room not available"/></Errors></OTA_HotelResNotifRS>',
      }));

      expect(await client.createReservation(reservation)).toEqual({
        success: false,
        message: "Failed to create reservation: Room not available",
        errors: ["Room not available"],
      });
    });

    it("treats a 2xx answer that is not XML as accepted", async () => {
      const { client } = fakeTransport(() => ({ status: 200, body: "OK" }));

      expect(await client.createReservation(reservation)).toEqual({
        success: true,
        message: "Reservation created successfully",
        reservationId: "RES-9",
      });
    });

    it("reports an HTTP failure as an unsuccessful result", async () => {
      const { client } = fakeTransport(() => ({ status: 500, body: "Internal failure" }));

      expect(await client.createReservation(reservation)).toEqual({
        success: false,
        message: "Failed to create reservation: 500",
        errors: ["Internal failure"],
      });
    });
  });
});
