// ============================================================================
// EXPRESS APPLICATION
// Assembled without listening so tests can drive it through supertest
// ============================================================================

import express, { type Application } from "express";
import { config } from "./config/index.js";
import {
  compressionMiddleware,
  contextMiddleware,
  corsMiddleware,
  defaultRateLimiter,
  errorHandlerMiddleware,
  helmetMiddleware,
  notFoundHandler,
  requestLoggingMiddleware,
  timeoutMiddleware,
} from "./middleware/index.js";
import { createApiRouter } from "./routes/index.js";
import { AnalyticsService } from "./services/analytics.service.js";
import type { AvailabilityGateway } from "./services/availability-gateway.js";
import { CapCornClient, type CapCornApi } from "./services/capcorn-client.service.js";
import { metrics } from "./utils/metrics.js";

export interface AppDependencies {
  /** Backend for the per-window sweep queries; defaults to `capcorn` */
  gateway?: AvailabilityGateway;
  capcorn?: CapCornApi;
  analytics?: AnalyticsService;
  hotelId?: string;
  /** Per-request deadline; defaults to the configured request timeout */
  requestTimeoutMs?: number;
}

export function createApp(deps: AppDependencies = {}): Application {
  const client = new CapCornClient();
  const capcorn = deps.capcorn ?? client;
  const gateway = deps.gateway ?? client;

  const app = express();

  if (config.security.trustProxy) app.set("trust proxy", 1);

  app.use(helmetMiddleware);
  app.use(corsMiddleware);
  app.use(express.json({ limit: "1mb" }));
  app.use(compressionMiddleware);
  app.use(contextMiddleware());
  app.use(requestLoggingMiddleware());
  app.use(timeoutMiddleware(deps.requestTimeoutMs));
  app.use(defaultRateLimiter);

  if (config.metrics.enabled) {
    app.get(config.metrics.path, (_req, res) => {
      res.type(metrics.getContentType()).send(metrics.getMetrics());
    });
  }

  app.use(
    "/api",
    createApiRouter({
      gateway,
      capcorn,
      analytics: deps.analytics ?? new AnalyticsService(),
      hotelId: deps.hotelId ?? config.capcorn.hotelId,
    })
  );
  app.get("/", (_req, res) => res.redirect("/api"));
  app.use(notFoundHandler());
  app.use(errorHandlerMiddleware());

  return app;
}
