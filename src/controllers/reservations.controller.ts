// ============================================================================
// RESERVATIONS CONTROLLER
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { ReservationRejectedError } from "../errors/index.js";
import { context } from "../utils/context.js";
import { metrics } from "../utils/metrics.js";
import { sendSuccess } from "../utils/response.js";
import type { AnalyticsService } from "../services/analytics.service.js";
import type { CapCornApi } from "../services/capcorn-client.service.js";
import type { ReservationRequestInput } from "../validation/index.js";

export class ReservationsController {
  constructor(
    private readonly capcorn: CapCornApi,
    private readonly analytics: AnalyticsService
  ) {}

  create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const body: ReservationRequestInput = req.body;
    context.setOperation("HotelResNotif");

    try {
      const result = await this.capcorn.createReservation(body);

      if (!result.success) {
        metrics.recordReservation("failed");
        throw new ReservationRejectedError(result.message, result.errors ?? []);
      }

      metrics.recordReservation("success");
      this.analytics.recordReservation({
        hotelId: body.hotelId,
        reservationId: body.reservationId,
        roomTypeCode: body.roomTypeCode,
        numberOfUnits: body.numberOfUnits,
        arrival: body.arrival,
        departure: body.departure,
        totalAmount: body.totalAmount,
        source: body.source,
      });

      sendSuccess(req, res, result, 201);
    } catch (error) {
      next(error);
    }
  };
}
