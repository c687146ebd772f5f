import type {
  AvailabilityGateway,
  AvailabilityQuery,
  QueryOptions,
} from "../services/availability-gateway.js";
import type { CapCornApi } from "../services/capcorn-client.service.js";
import type {
  AvailabilityResult,
  ReservationRequest,
  ReservationResult,
  RoomAvailabilityRequest,
  RoomOption,
} from "../types/capcorn.types.js";

export function roomOption(categoryCode: string, totalPrice: number): RoomOption {
  return {
    categoryCode,
    typeName: "Doppelzimmer",
    description: "Zimmer mit Bergblick",
    sizeSqm: 28,
    totalPrice,
    pricePerPerson: totalPrice / 2,
    pricePerAdult: totalPrice / 2,
    pricePerNight: totalPrice / 4,
    boardCode: 2,
    roomTypeCode: 1,
  };
}

export function availabilityFor(query: AvailabilityQuery, options: RoomOption[]): AvailabilityResult {
  return {
    members: [
      {
        hotelId: query.hotelId,
        rooms: [
          {
            arrival: query.arrival,
            departure: query.departure,
            adults: query.party.adults,
            children: query.party.children,
            options,
          },
        ],
      },
    ],
  };
}

type Responder = (query: AvailabilityQuery) => AvailabilityResult | Error | Promise<AvailabilityResult>;

/**
 * Gateway answering from a function; a returned Error rejects the call
 */
export class StubGateway implements AvailabilityGateway {
  readonly calls: AvailabilityQuery[] = [];

  constructor(private readonly respond: Responder) {}

  async queryAvailability(query: AvailabilityQuery, _options?: QueryOptions): Promise<AvailabilityResult> {
    this.calls.push(query);
    const answer = await this.respond(query);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}

/** One option per window, named after the arrival date and priced 480 */
export function oneOptionPerWindow(query: AvailabilityQuery): AvailabilityResult {
  return availabilityFor(query, [roomOption(`CAT-${query.arrival}`, 480)]);
}

/**
 * Gateway that never answers until its signal aborts
 */
export class HangingGateway implements AvailabilityGateway {
  calls = 0;
  readonly signals: Array<AbortSignal | undefined> = [];

  queryAvailability(_query: AvailabilityQuery, options?: QueryOptions): Promise<AvailabilityResult> {
    this.calls++;
    this.signals.push(options?.signal);
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
  }
}

export class StubCapCorn implements CapCornApi {
  readonly availabilityRequests: RoomAvailabilityRequest[] = [];
  readonly reservationRequests: ReservationRequest[] = [];

  constructor(
    private readonly reservationResult: ReservationResult = {
      success: true,
      message: "Reservation created successfully",
      reservationId: "RES-1",
    }
  ) {}

  async searchRoomAvailability(request: RoomAvailabilityRequest): Promise<AvailabilityResult> {
    this.availabilityRequests.push(request);
    return {
      members: [
        {
          hotelId: request.hotelId,
          rooms: request.rooms.map((room) => ({
            arrival: request.arrival,
            departure: request.departure,
            adults: room.adults,
            children: room.children,
            options: [roomOption("DZ", 320)],
          })),
        },
      ],
    };
  }

  async createReservation(request: ReservationRequest): Promise<ReservationResult> {
    this.reservationRequests.push(request);
    return this.reservationResult;
  }
}

export function reservationBody() {
  return {
    hotelId: "9100",
    roomTypeCode: "DZ",
    mealPlan: 2,
    guestCounts: [
      { ageQualifyingCode: 10, count: 2 },
      { ageQualifyingCode: 8, count: 1, age: 7 },
    ],
    arrival: "2024-01-01",
    departure: "2024-01-05",
    totalAmount: 480,
    guest: {
      namePrefix: "Frau",
      givenName: "Erika",
      surname: "Muster",
      phoneNumber: "+43 000 000000",
      email: "guest@example.com",
      address: {
        addressLine: "Hauptstrasse 1",
        cityName: "Innsbruck",
        postalCode: "6020",
        countryCode: "AT",
      },
    },
    reservationId: "RES-1",
  };
}
