// ============================================================================
// SECURITY MIDDLEWARE
// Helmet and CORS configuration
// ============================================================================

import helmet from "helmet";
import cors from "cors";
import { config } from "../config/index.js";
import { logger } from "../utils/logger.js";

// JSON-only API: nothing here is ever rendered as a page
export const helmetMiddleware = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: "cross-origin" },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: "no-referrer" },
});

const allowAnyOrigin = config.security.corsOrigins.includes("*");

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Server-to-server callers and curl send no Origin
    if (!origin || allowAnyOrigin || config.security.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    if (config.app.isDev && (origin.includes("localhost") || origin.includes("127.0.0.1"))) {
      return callback(null, true);
    }

    logger.warn({ origin }, "CORS request blocked");
    callback(null, false);
  },
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "X-Correlation-ID", "X-Request-ID"],
  exposedHeaders: [
    "X-Correlation-ID",
    "X-Request-ID",
    "RateLimit-Limit",
    "RateLimit-Remaining",
    "RateLimit-Reset",
  ],
  maxAge: 86400,
});
