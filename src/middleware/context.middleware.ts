// ============================================================================
// REQUEST CONTEXT MIDDLEWARE
// Initializes async local storage context for each request
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { v4 as uuidv4 } from "uuid";
import { context } from "../utils/context.js";

// Header names for correlation
const CORRELATION_ID_HEADER = "x-correlation-id";
const REQUEST_ID_HEADER = "x-request-id";

// Caller ids end up in every log line and in the echoed header
const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * The caller's correlation id when it is a plain token, otherwise a fresh one
 */
export function resolveCorrelationId(raw: string | undefined): string {
  return raw !== undefined && CORRELATION_ID_PATTERN.test(raw) ? raw : uuidv4();
}

/**
 * Middleware to initialize request context with correlation tracking
 */
export function contextMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = resolveCorrelationId(headerValue(req, CORRELATION_ID_HEADER));

    // Unique per request, even when the caller reuses a correlation id
    const transactionId = uuidv4();

    // Set response headers for tracing
    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    res.setHeader(REQUEST_ID_HEADER, transactionId);

    // Run the rest of the request, including every sweep window, within the context
    context.run(
      {
        correlationId,
        transactionId,
        startTime: Date.now(),
        // req.ip honours the trust-proxy setting
        clientIp: req.ip || req.socket.remoteAddress || "unknown",
        userAgent: req.headers["user-agent"] || "unknown",
        operation: `${req.method} ${req.path}`,
      },
      () => next()
    );
  };
}
