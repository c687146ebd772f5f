import { Router } from "express";
import type { AnalyticsController } from "../controllers/analytics.controller.js";
import { validateQuery } from "../middleware/index.js";
import { analyticsQuerySchema } from "../validation/index.js";

export function createAnalyticsRouter(controller: AnalyticsController): Router {
  const router = Router();
  router.get("/summary", validateQuery(analyticsQuerySchema), controller.summary);
  router.get("/stats", controller.stats);
  return router;
}
