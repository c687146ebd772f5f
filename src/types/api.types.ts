// ============================================================================
// API TYPES
// Request/Response contracts for REST endpoints
// ============================================================================

// ----------------------------------------------------------------------------
// COMMON API RESPONSE WRAPPER
// ----------------------------------------------------------------------------

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  meta: ResponseMeta;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  retryable: boolean;
}

export interface ResponseMeta {
  transactionId: string;
  correlationId: string;
  timestamp: string;
  duration: number;
  operation: string;
}

// ----------------------------------------------------------------------------
// ROOM SEARCH
// ----------------------------------------------------------------------------

export interface RoomSearchOption {
  arrival: string;
  departure: string;
  categoryCode: string;
  typeName: string;
  description: string;
  sizeSqm: number;
  price: number;
  pricePerPerson: number;
  pricePerAdult: number;
  pricePerNight: number;
  boardCode: number;
  roomTypeCode: number;
}

export interface RoomSearchResponseData {
  totalQueries: number;
  totalOptions: number;
  failedQueries: number;
  durationDays: number;
  options: RoomSearchOption[];
}
