// ============================================================================
// CAPCORN CLIENT SERVICE
// Builds CapCorn XML, posts it and decodes the answer
// ============================================================================

import { config } from "../config/index.js";
import { buildReservationXml, buildRoomAvailabilityXml } from "../builders/index.js";
import { reservationResponseParser, roomAvailabilityParser } from "../parsers/index.js";
import { AppError, UpstreamApiError } from "../errors/index.js";
import { logger } from "../utils/logger.js";
import { metrics } from "../utils/metrics.js";
import { HttpClientService } from "./http-client.service.js";
import type { AvailabilityGateway, AvailabilityQuery, QueryOptions } from "./availability-gateway.js";
import type {
  AvailabilityResult,
  ReservationRequest,
  ReservationResult,
  RoomAvailabilityRequest,
} from "../types/capcorn.types.js";

export interface CapCornSettings {
  baseUrl: string;
  system: string;
  user: string;
  password: string;
  pin: string;
  requestTimeout: number;
  endpoints: {
    roomAvailability: string;
    reservation: string;
  };
}

type CapCornOperation = "RoomAvailability" | "HotelResNotif";

export class CapCornClient implements AvailabilityGateway {
  private readonly http: HttpClientService;

  constructor(
    private readonly settings: CapCornSettings = config.capcorn,
    http?: HttpClientService
  ) {
    this.http =
      http ??
      new HttpClientService({
        baseURL: settings.baseUrl,
        timeout: settings.requestTimeout,
      });
  }

  /**
   * Search available rooms for one arrival/departure pair
   */
  async searchRoomAvailability(
    request: RoomAvailabilityRequest,
    options?: QueryOptions
  ): Promise<AvailabilityResult> {
    const xmlRequest = buildRoomAvailabilityXml(request);

    const xmlResponse = await this.post("RoomAvailability", this.settings.endpoints.roomAvailability, xmlRequest, {
      params: {
        user: this.settings.user,
        password: this.settings.password,
        system: this.settings.system,
      },
      signal: options?.signal,
    });

    return roomAvailabilityParser.parse(xmlResponse);
  }

  queryAvailability(query: AvailabilityQuery, options?: QueryOptions): Promise<AvailabilityResult> {
    return this.searchRoomAvailability(
      {
        language: query.language,
        hotelId: query.hotelId,
        arrival: query.arrival,
        departure: query.departure,
        rooms: [query.party],
      },
      options
    );
  }

  /**
   * Create a reservation. HTTP failures and <Errors> in the answer come back as
   * an unsuccessful result; anything else (connection loss) is thrown.
   */
  async createReservation(request: ReservationRequest): Promise<ReservationResult> {
    const xmlRequest = buildReservationXml(request);

    let xmlResponse: string;
    try {
      xmlResponse = await this.post("HotelResNotif", this.settings.endpoints.reservation, xmlRequest, {
        params: {
          hotelId: request.hotelId,
          pin: this.settings.pin,
        },
      });
    } catch (error) {
      if (error instanceof UpstreamApiError) {
        const body = error.details?.responseBody;
        return {
          success: false,
          message: `Failed to create reservation: ${String(error.details?.upstreamStatus)}`,
          errors: typeof body === "string" && body !== "" ? [body] : [error.message],
        };
      }
      throw error;
    }

    // CapCorn has booked the room once it answers 2xx, whatever the body holds
    const parsed = reservationResponseParser.parse(xmlResponse);
    if (!parsed.readable && xmlResponse.trim() !== "") {
      logger.warn(
        {
          type: "reservation_unreadable_answer",
          reservationId: request.reservationId,
          body: xmlResponse.slice(0, 500),
        },
        "CapCorn accepted the reservation with a non-XML answer"
      );
    }
    if (!parsed.success) {
      return {
        success: false,
        message: `Failed to create reservation: ${parsed.errors[0] ?? "rejected by CapCorn"}`,
        errors: parsed.errors,
      };
    }

    return {
      success: true,
      message: "Reservation created successfully",
      reservationId: request.reservationId,
    };
  }

  private async post(
    operation: CapCornOperation,
    endpoint: string,
    xmlRequest: string,
    requestConfig: { params: Record<string, string>; signal?: AbortSignal }
  ): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.http.post(endpoint, xmlRequest, requestConfig);
      const duration = Date.now() - startTime;

      logger.upstreamCall({
        operation,
        success: true,
        duration,
        status: response.status,
        requestSize: xmlRequest.length,
        responseSize: response.data.length,
      });
      metrics.recordUpstreamCall(operation, "success", duration);

      return response.data;
    } catch (error) {
      const duration = Date.now() - startTime;

      logger.upstreamCall({
        operation,
        success: false,
        duration,
        requestSize: xmlRequest.length,
        errorCode: error instanceof AppError ? error.code : undefined,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
      metrics.recordUpstreamCall(operation, "error", duration);

      throw error;
    }
  }
}

/** The CapCorn operations controllers call directly, outside the sweep */
export type CapCornApi = Pick<CapCornClient, "searchRoomAvailability" | "createReservation">;
