import { Router } from "express";
import { AnalyticsController } from "../controllers/analytics.controller.js";
import { healthController } from "../controllers/health.controller.js";
import { ReservationsController } from "../controllers/reservations.controller.js";
import { RoomsController } from "../controllers/rooms.controller.js";
import { SweepSearchService } from "../services/sweep-search.service.js";
import type { AnalyticsService } from "../services/analytics.service.js";
import type { AvailabilityGateway } from "../services/availability-gateway.js";
import type { CapCornApi } from "../services/capcorn-client.service.js";
import healthRoutes from "./health.routes.js";
import { createAnalyticsRouter } from "./analytics.routes.js";
import { createReservationsRouter } from "./reservations.routes.js";
import { createRoomsRouter } from "./rooms.routes.js";

export interface RouteDependencies {
  gateway: AvailabilityGateway;
  capcorn: CapCornApi;
  analytics: AnalyticsService;
  hotelId: string;
}

export function createApiRouter(deps: RouteDependencies): Router {
  const sweep = new SweepSearchService(deps.gateway, deps.hotelId);

  const v1 = Router();
  v1.use("/rooms", createRoomsRouter(new RoomsController(sweep, deps.capcorn, deps.analytics)));
  v1.use("/reservations", createReservationsRouter(new ReservationsController(deps.capcorn, deps.analytics)));
  v1.use("/analytics", createAnalyticsRouter(new AnalyticsController(deps.analytics)));

  const router = Router();
  router.use("/", healthRoutes);
  router.use("/v1", v1);
  router.get("/", healthController.index);
  return router;
}
