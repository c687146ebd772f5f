// ============================================================================
// RATE LIMITING MIDDLEWARE
// ============================================================================

import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";
import { config } from "../config/index.js";
import { ErrorCode } from "../errors/index.js";
import { logger } from "../utils/logger.js";
import { buildMeta } from "../utils/response.js";
import type { ApiResponse } from "../types/api.types.js";

const SKIP_PATHS = new Set(["/api/health", "/api/ready", "/metrics"]);

function handleRateLimited(req: Request, res: Response): void {
  logger.warn(
    {
      type: "rate_limited",
      ip: req.ip,
      path: req.path,
    },
    "Rate limit exceeded"
  );

  const response: ApiResponse = {
    success: false,
    error: {
      code: ErrorCode.RATE_LIMITED,
      message: "Too many requests. Please slow down.",
      retryable: true,
      details: { retryAfterMs: config.resilience.rateLimit.windowMs },
    },
    meta: buildMeta(req),
  };

  res.status(429).json(response);
}

/**
 * Every sweep fans out into one upstream call per date window, so the limit
 * protects CapCorn as much as this service.
 */
export const defaultRateLimiter = rateLimit({
  windowMs: config.resilience.rateLimit.windowMs,
  limit: config.resilience.rateLimit.maxRequests,
  handler: handleRateLimited,
  skip: (req) => SKIP_PATHS.has(req.path),
  standardHeaders: true,
  legacyHeaders: false,
});
