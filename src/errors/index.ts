// ============================================================================
// ERROR EXPORTS
// ============================================================================

export { AppError, ErrorCode, type ErrorOptions } from "./base.error.js";
export {
  // Validation
  ValidationError,
  InvalidRequestError,
  // Sweep search
  InvalidRangeError,
  NoWindowsError,
  WindowQueryError,
  SearchCancelledError,
  // Upstream
  UpstreamApiError,
  UpstreamConnectionError,
  UpstreamTimeoutError,
  XmlParseError,
  ReservationRejectedError,
  // System
  TimeoutError,
  NotFoundError,
} from "./specific.errors.js";
