import { Router } from "express";
import type { RoomsController } from "../controllers/rooms.controller.js";
import { validateBody } from "../middleware/index.js";
import { roomAvailabilityRequestSchema, roomSearchRequestSchema } from "../validation/index.js";

export function createRoomsRouter(controller: RoomsController): Router {
  const router = Router();
  router.post("/search", validateBody(roomSearchRequestSchema), controller.search);
  router.post("/availability", validateBody(roomAvailabilityRequestSchema), controller.availability);
  return router;
}
