import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "../app.js";
import { AnalyticsService } from "../services/analytics.service.js";
import { StubCapCorn, StubGateway, oneOptionPerWindow } from "./fixtures.js";

function setup() {
  const analytics = new AnalyticsService(100);
  const app = createApp({ gateway: new StubGateway(oneOptionPerWindow), capcorn: new StubCapCorn(), analytics });
  return { app, analytics };
}

describe("Analytics Endpoints", () => {
  it("GET /api/v1/analytics/summary reports recorded searches", async () => {
    const { app } = setup();
    await request(app)
      .post("/api/v1/rooms/search")
      .send({ timespan: { from: "2024-01-01", to: "2024-01-04" }, duration: 2, adults: 1 });

    const res = await request(app).get("/api/v1/analytics/summary").query({ hours: 6 });

    expect(res.status).toBe(200);
    expect(res.body.data.timespanHours).toBe(6);
    expect(res.body.data.totalSearches).toBe(1);
    expect(res.body.data.totalRoomsFound).toBe(2);
    expect(res.body.data.popularDurations).toEqual({ "2": 1 });
  });

  it("defaults to the last 24 hours", async () => {
    const { app } = setup();

    const res = await request(app).get("/api/v1/analytics/summary");

    expect(res.body.data.timespanHours).toBe(24);
  });

  it("rejects hours outside 1..24", async () => {
    const { app } = setup();

    const res = await request(app).get("/api/v1/analytics/summary?hours=25");

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.message).toBe("Validation failed for query");
  });

  it("GET /api/v1/analytics/stats reports storage counts", async () => {
    const { app, analytics } = setup();
    analytics.recordReservation({ totalAmount: 99 });

    const res = await request(app).get("/api/v1/analytics/stats");

    expect(res.status).toBe(200);
    expect(res.body.data.totalSearchesInMemory).toBe(0);
    expect(res.body.data.totalReservationsInMemory).toBe(1);
    expect(res.body.data.oldestSearch).toBeNull();
  });
});
