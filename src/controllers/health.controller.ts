// ============================================================================
// HEALTH CONTROLLER
// ============================================================================

import type { Request, Response } from "express";
import { config } from "../config/index.js";

function memoryUsage() {
  const usage = process.memoryUsage();
  return {
    used: Math.round(usage.heapUsed / 1024 / 1024),
    total: Math.round(usage.heapTotal / 1024 / 1024),
    unit: "MB",
  };
}

class HealthController {
  private startTime = Date.now();

  health = (_req: Request, res: Response): void => {
    const uptime = Math.floor((Date.now() - this.startTime) / 1000);
    res.json({
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: `${uptime}s`,
      version: config.app.version,
      environment: config.app.env,
      memory: memoryUsage(),
    });
  };

  // Ready once CapCorn credentials are configured; there is nothing to warm up
  ready = (_req: Request, res: Response): void => {
    const configured = config.capcorn.hotelId !== "" && config.capcorn.user !== "";
    res.status(configured ? 200 : 503).json({
      ready: configured,
      timestamp: new Date().toISOString(),
    });
  };

  index = (_req: Request, res: Response): void => {
    res.json({
      name: config.app.name,
      version: config.app.version,
      description: "Hotel availability gateway in front of the CapCorn booking backend",
      endpoints: {
        health: { health: "GET /api/health", ready: "GET /api/ready" },
        rooms: {
          search: "POST /api/v1/rooms/search",
          availability: "POST /api/v1/rooms/availability",
        },
        reservations: { create: "POST /api/v1/reservations" },
        analytics: {
          summary: "GET /api/v1/analytics/summary?hours=24",
          stats: "GET /api/v1/analytics/stats",
        },
        metrics: `GET ${config.metrics.path}`,
      },
    });
  };
}

export const healthController = new HealthController();
