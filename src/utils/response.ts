// ============================================================================
// RESPONSE ENVELOPE
// ============================================================================

import type { Request, Response } from "express";
import { context } from "./context.js";
import type { ApiResponse, ResponseMeta } from "../types/api.types.js";

export function buildMeta(req: Request): ResponseMeta {
  const ctx = context.get();
  return {
    transactionId: ctx?.transactionId || "unknown",
    correlationId: ctx?.correlationId || "unknown",
    timestamp: new Date().toISOString(),
    duration: ctx ? Date.now() - ctx.startTime : 0,
    operation: ctx?.operation || `${req.method} ${req.path}`,
  };
}

export function sendSuccess<T>(req: Request, res: Response, data: T, statusCode = 200): void {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: buildMeta(req),
  };
  res.status(statusCode).json(response);
}
