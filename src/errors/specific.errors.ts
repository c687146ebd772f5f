// ============================================================================
// SPECIFIC ERROR CLASSES
// ============================================================================

import type { ZodError } from "zod";
import { AppError, ErrorCode } from "./base.error.js";

// ----------------------------------------------------------------------------
// VALIDATION ERRORS
// ----------------------------------------------------------------------------

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      statusCode: 400,
      retryable: false,
      details,
    });
  }

  static fromZod(error: ZodError, target = "body"): ValidationError {
    const fields: Record<string, string> = {};
    for (const issue of error.errors) {
      fields[issue.path.join(".") || "root"] = issue.message;
    }

    return new ValidationError(`Validation failed for ${target}`, { fields });
  }
}

export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super({
      code: ErrorCode.INVALID_REQUEST,
      message,
      statusCode: 400,
      retryable: false,
    });
  }
}

// ----------------------------------------------------------------------------
// SWEEP SEARCH ERRORS
// ----------------------------------------------------------------------------

/**
 * The timespan and stay length cannot produce a single date window.
 */
export class InvalidRangeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: ErrorCode.INVALID_DATE_RANGE,
      message,
      statusCode: 400,
      retryable: false,
      details,
    });
  }
}

export class NoWindowsError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super({
      code: ErrorCode.NO_DATE_WINDOWS,
      message: "No valid date ranges could be generated from timespan and duration",
      statusCode: 400,
      retryable: false,
      details,
    });
  }
}

/**
 * One window of a sweep failed. Recovered inside the sweep and never sent to a client.
 */
export class WindowQueryError extends AppError {
  public readonly arrival: string;
  public readonly departure: string;

  constructor(arrival: string, departure: string, cause: unknown) {
    const reason = cause instanceof Error ? cause : new Error(String(cause));
    super({
      code: ErrorCode.WINDOW_QUERY_FAILED,
      message: `Availability query for ${arrival} → ${departure} failed: ${reason.message}`,
      statusCode: 502,
      retryable: true,
      cause: reason,
      details: {
        arrival,
        departure,
        reasonCode: cause instanceof AppError ? cause.code : undefined,
      },
    });
    this.arrival = arrival;
    this.departure = departure;
  }
}

export class SearchCancelledError extends AppError {
  constructor(reason = "Search was cancelled before all date windows completed") {
    super({
      code: ErrorCode.REQUEST_CANCELLED,
      message: reason,
      statusCode: 499,
      retryable: true,
    });
  }
}

// ----------------------------------------------------------------------------
// UPSTREAM ERRORS
// ----------------------------------------------------------------------------

export class UpstreamApiError extends AppError {
  constructor(
    message: string,
    options?: { status?: number; responseBody?: string; cause?: Error }
  ) {
    super({
      code: ErrorCode.UPSTREAM_ERROR,
      message,
      statusCode: 502,
      retryable: options?.status !== undefined && options.status >= 500,
      cause: options?.cause,
      details: {
        upstreamStatus: options?.status,
        responseBody: options?.responseBody?.substring(0, 500),
      },
    });
  }
}

export class UpstreamConnectionError extends AppError {
  constructor(message: string, cause?: Error) {
    super({
      code: ErrorCode.UPSTREAM_CONNECTION_ERROR,
      message: `Failed to connect to CapCorn: ${message}`,
      statusCode: 503,
      retryable: true,
      cause,
    });
  }
}

export class UpstreamTimeoutError extends AppError {
  constructor(url: string, timeoutMs: number) {
    super({
      code: ErrorCode.UPSTREAM_TIMEOUT,
      message: `CapCorn request timed out after ${timeoutMs}ms`,
      statusCode: 504,
      retryable: true,
      details: { url, timeoutMs },
    });
  }
}

export class XmlParseError extends AppError {
  constructor(message: string, cause?: Error) {
    super({
      code: ErrorCode.XML_PARSE_ERROR,
      message: `Failed to parse CapCorn XML: ${message}`,
      statusCode: 502,
      retryable: false,
      cause,
    });
  }
}

export class ReservationRejectedError extends AppError {
  constructor(message: string, errors: string[]) {
    super({
      code: ErrorCode.RESERVATION_REJECTED,
      message,
      statusCode: 400,
      retryable: false,
      details: { errors },
    });
  }
}

// ----------------------------------------------------------------------------
// SYSTEM ERRORS
// ----------------------------------------------------------------------------

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super({
      code: ErrorCode.TIMEOUT,
      message: `${operation} timed out after ${timeoutMs}ms`,
      statusCode: 504,
      retryable: true,
      details: { operation, timeoutMs },
    });
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super({
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `${resource} not found`,
      statusCode: 404,
      retryable: false,
    });
  }
}
