// ============================================================================
// ERROR HANDLER MIDDLEWARE
// Centralized error handling with structured responses
// ============================================================================

import type { Request, Response, NextFunction } from "express";
import { AppError, ErrorCode, InvalidRequestError, NotFoundError } from "../errors/index.js";
import { logger } from "../utils/logger.js";
import { buildMeta } from "../utils/response.js";
import { config } from "../config/index.js";
import type { ApiResponse, ApiError } from "../types/api.types.js";

/**
 * body-parser rejects malformed JSON with the SyntaxError it caught, tagged with the raw body
 */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "body" in err;
}

function renderAppError(err: AppError, req: Request, res: Response): void {
  if (err.isServerError()) {
    logger.error(
      {
        type: "app_error",
        error: err.toJSON(),
        stack: err.stack,
        cause: err.cause,
      },
      err.message
    );
  } else {
    logger.warn({ type: "app_error", error: err.toJSON() }, err.message);
  }

  const response: ApiResponse = {
    success: false,
    error: {
      code: err.code,
      message: err.message,
      retryable: err.retryable,
      details: err.details,
    },
    meta: buildMeta(req),
  };

  res.status(err.statusCode).json(response);
}

/**
 * Global error handler middleware
 */
export function errorHandlerMiddleware() {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    // A timeout or a client disconnect already ended this response
    if (res.headersSent) {
      logger.debug({ type: "late_error", error: err.message }, "Error after response was sent");
      return;
    }

    if (err instanceof AppError) {
      renderAppError(err, req, res);
      return;
    }

    if (isBodyParseError(err)) {
      renderAppError(new InvalidRequestError("Invalid JSON in request body"), req, res);
      return;
    }

    logger.error(
      {
        type: "unhandled_error",
        error: {
          name: err.name,
          message: err.message,
          stack: err.stack,
        },
      },
      "Unhandled error"
    );

    const apiError: ApiError = {
      code: ErrorCode.INTERNAL_ERROR,
      message: config.app.isProd ? "An unexpected error occurred" : err.message,
      retryable: false,
      details: config.app.isDev ? { stack: err.stack } : undefined,
    };
    const response: ApiResponse = {
      success: false,
      error: apiError,
      meta: buildMeta(req),
    };

    res.status(500).json(response);
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  };
}
