// ============================================================================
// REQUEST LOGGING MIDDLEWARE
// Logs HTTP requests with timing and response details
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import onFinished from "on-finished";
import { config } from "../config/index.js";
import { logger } from "../utils/logger.js";
import { context } from "../utils/context.js";
import { metrics } from "../utils/metrics.js";

// Probes and scrapes would drown out real traffic
const SKIP_PATHS = new Set(["/api/health", "/api/ready", "/metrics", "/favicon.ico"]);

/**
 * Route pattern for metric labels, so ids in paths don't explode cardinality
 */
function routeLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  return typeof routePath === "string" ? `${req.baseUrl}${routePath}` : req.path;
}

export function requestLoggingMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path) || !config.logging.enableRequestLogging) {
      return next();
    }

    const startTime = Date.now();
    metrics.httpRequestsInFlight.inc();

    logger.debug(
      {
        type: "request_start",
        method: req.method,
        url: req.originalUrl,
        contentLength: req.headers["content-length"],
        contentType: req.headers["content-type"],
      },
      "Request started"
    );

    onFinished(res, (_err, response) => {
      const duration = Date.now() - startTime;
      const ctx = context.get();

      metrics.httpRequestsInFlight.dec();
      metrics.recordHttpRequest(req.method, routeLabel(req), response.statusCode, duration);

      const logData = {
        type: "request_complete",
        method: req.method,
        url: req.originalUrl,
        statusCode: response.statusCode,
        duration,
        contentLength: response.getHeader("content-length"),
        clientIp: ctx?.clientIp,
        userAgent: ctx?.userAgent?.substring(0, 100),
      };
      const message = `${req.method} ${req.originalUrl} ${response.statusCode} ${duration}ms`;

      if (response.statusCode >= 500) {
        logger.error(logData, message);
      } else if (response.statusCode >= 400) {
        logger.warn(logData, message);
      } else {
        logger.info(logData, message);
      }
    });

    next();
  };
}
