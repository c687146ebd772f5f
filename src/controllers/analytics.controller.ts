// ============================================================================
// ANALYTICS CONTROLLER
// ============================================================================

import type { Request, Response } from "express";
import { sendSuccess } from "../utils/response.js";
import type { AnalyticsService } from "../services/analytics.service.js";
import type { AnalyticsQueryInput } from "../validation/index.js";

export class AnalyticsController {
  constructor(private readonly analytics: AnalyticsService) {}

  summary = (req: Request, res: Response): void => {
    const query: AnalyticsQueryInput = res.locals.query;
    sendSuccess(req, res, this.analytics.getSummary(query.hours));
  };

  stats = (req: Request, res: Response): void => {
    sendSuccess(req, res, this.analytics.getStats());
  };
}
