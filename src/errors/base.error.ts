// ============================================================================
// BASE ERROR CLASSES
// Structured error hierarchy for the application
// ============================================================================

export enum ErrorCode {
  // Client Errors (4xx)
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INVALID_REQUEST = "INVALID_REQUEST",
  INVALID_DATE_RANGE = "INVALID_DATE_RANGE",
  NO_DATE_WINDOWS = "NO_DATE_WINDOWS",
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  RATE_LIMITED = "RATE_LIMITED",
  REQUEST_CANCELLED = "REQUEST_CANCELLED",
  RESERVATION_REJECTED = "RESERVATION_REJECTED",

  // Upstream (CapCorn) Errors
  UPSTREAM_ERROR = "UPSTREAM_ERROR",
  UPSTREAM_CONNECTION_ERROR = "UPSTREAM_CONNECTION_ERROR",
  UPSTREAM_TIMEOUT = "UPSTREAM_TIMEOUT",
  WINDOW_QUERY_FAILED = "WINDOW_QUERY_FAILED",

  // System Errors (5xx)
  INTERNAL_ERROR = "INTERNAL_ERROR",
  TIMEOUT = "TIMEOUT",
  XML_PARSE_ERROR = "XML_PARSE_ERROR",
}

export interface ErrorOptions {
  code: ErrorCode;
  message: string;
  statusCode?: number;
  retryable?: boolean;
  cause?: Error;
  details?: Record<string, unknown>;
}

// ----------------------------------------------------------------------------
// BASE APPLICATION ERROR
// ----------------------------------------------------------------------------

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly retryable: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(options: ErrorOptions) {
    super(options.message);

    this.name = this.constructor.name;
    this.code = options.code;
    this.statusCode = options.statusCode || 500;
    this.retryable = options.retryable ?? false;
    this.details = options.details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    if (options.cause) {
      this.cause = options.cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      details: this.details,
      timestamp: this.timestamp,
    };
  }

  isServerError(): boolean {
    return this.statusCode >= 500;
  }
}
