// ============================================================================
// TIMEOUT MIDDLEWARE
// Request timeout handling to prevent hung requests
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { config } from "../config/index.js";
import { TimeoutError } from "../errors/index.js";
import { context } from "../utils/context.js";
import { logger } from "../utils/logger.js";

// Probes and scrapes answer from memory and never wait on CapCorn
const SKIP_PATHS = new Set(["/api/health", "/api/ready", config.metrics.path]);

/**
 * Middleware to enforce request timeouts.
 *
 * The 504 ends the response; handlers still waiting on CapCorn see the
 * response close and cancel their upstream calls.
 */
export function timeoutMiddleware(timeoutMs?: number) {
  const timeout = timeoutMs || config.resilience.timeouts.request;

  return (req: Request, res: Response, next: NextFunction): void => {
    // Skip timeout for probes
    if (SKIP_PATHS.has(req.path)) {
      return next();
    }

    const timer = setTimeout(() => {
      logger.error(
        {
          type: "request_timeout",
          path: req.path,
          method: req.method,
          operation: context.get()?.operation,
          timeout,
        },
        `Request timed out after ${timeout}ms`
      );

      // A handler that answered in the meantime keeps its response
      if (!res.headersSent) {
        next(new TimeoutError(`${req.method} ${req.path}`, timeout));
      }
    }, timeout);

    // Clear timeout when response finishes or the client goes away
    res.on("finish", () => clearTimeout(timer));
    res.on("close", () => clearTimeout(timer));

    next();
  };
}
