// ============================================================================
// MIDDLEWARE EXPORTS
// ============================================================================

export { contextMiddleware } from "./context.middleware.js";
export { requestLoggingMiddleware } from "./logging.middleware.js";
export { validateRequest, validateBody, validateQuery } from "./validation.middleware.js";
export { defaultRateLimiter } from "./rate-limit.middleware.js";
export { errorHandlerMiddleware, notFoundHandler } from "./error-handler.middleware.js";
export { helmetMiddleware, corsMiddleware } from "./security.middleware.js";
export { timeoutMiddleware } from "./timeout.middleware.js";
export { compressionMiddleware } from "./compression.middleware.js";
