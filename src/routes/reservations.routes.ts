import { Router } from "express";
import type { ReservationsController } from "../controllers/reservations.controller.js";
import { validateBody } from "../middleware/index.js";
import { reservationRequestSchema } from "../validation/index.js";

export function createReservationsRouter(controller: ReservationsController): Router {
  const router = Router();
  router.post("/", validateBody(reservationRequestSchema), controller.create);
  return router;
}
