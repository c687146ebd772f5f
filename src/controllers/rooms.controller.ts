// ============================================================================
// ROOMS CONTROLLER
// Date-window sweep search and direct availability lookups
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { context } from "../utils/context.js";
import { logger } from "../utils/logger.js";
import { sendSuccess } from "../utils/response.js";
import type { AnalyticsService } from "../services/analytics.service.js";
import type { CapCornApi } from "../services/capcorn-client.service.js";
import type { SweepSearchService } from "../services/sweep-search.service.js";
import type { DatedRoomOption } from "../types/sweep.types.js";
import type { RoomSearchOption, RoomSearchResponseData } from "../types/api.types.js";
import type {
  RoomAvailabilityRequestInput,
  RoomSearchRequestInput,
} from "../validation/index.js";

export function toRoomSearchOption(option: DatedRoomOption): RoomSearchOption {
  return {
    arrival: option.arrival,
    departure: option.departure,
    categoryCode: option.categoryCode,
    typeName: option.typeName,
    description: option.description,
    sizeSqm: option.sizeSqm,
    price: option.totalPrice,
    pricePerPerson: option.pricePerPerson,
    pricePerAdult: option.pricePerAdult,
    pricePerNight: option.pricePerNight,
    boardCode: option.boardCode,
    roomTypeCode: option.roomTypeCode,
  };
}

export class RoomsController {
  constructor(
    private readonly sweep: SweepSearchService,
    private readonly capcorn: CapCornApi,
    private readonly analytics: AnalyticsService
  ) {}

  search = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const body: RoomSearchRequestInput = req.body;
    context.setOperation("RoomSearch");

    // Stop querying CapCorn once nobody is waiting for the answer: the
    // client went away, or a timeout already answered for us
    const abort = new AbortController();
    let settled = false;
    const onClose = (): void => {
      if (!settled) {
        abort.abort();
      }
    };
    res.on("close", onClose);

    try {
      const eventId = this.analytics.recordRoomSearch({
        language: body.language,
        timespan: body.timespan,
        duration: body.duration,
        adults: body.adults,
        children: body.children,
      });

      const result = await this.sweep.search(
        {
          language: body.language,
          timespan: body.timespan,
          duration: body.duration,
          party: { adults: body.adults, children: body.children },
        },
        { signal: abort.signal }
      ).finally(() => {
        settled = true;
      });

      this.analytics.recordSearchOutcome(eventId, result.totalOptionsFound);

      if (res.headersSent) {
        logger.debug({ type: "late_result" }, "Sweep finished after the response was sent");
        return;
      }

      const data: RoomSearchResponseData = {
        totalQueries: result.totalQueriesIssued,
        totalOptions: result.totalOptionsFound,
        failedQueries: result.failedQueries,
        durationDays: result.durationDays,
        options: result.options.map(toRoomSearchOption),
      };
      sendSuccess(req, res, data);
    } catch (error) {
      next(error);
    } finally {
      res.off("close", onClose);
    }
  };

  availability = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const body: RoomAvailabilityRequestInput = req.body;
    context.setOperation("RoomAvailability");

    try {
      const result = await this.capcorn.searchRoomAvailability(body);
      sendSuccess(req, res, result);
    } catch (error) {
      next(error);
    }
  };
}
