import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "../app.js";
import { StubCapCorn, StubGateway, oneOptionPerWindow } from "./fixtures.js";

const app = createApp({ gateway: new StubGateway(oneOptionPerWindow), capcorn: new StubCapCorn() });

describe("Health Endpoints", () => {
  it("GET /api/health returns healthy status", async () => {
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body.status).toBe("healthy");
    expect(res.body.version).toBeDefined();
  });

  it("GET /api/ready returns ready status", async () => {
    const res = await request(app).get("/api/ready");
    expect(res.status).toBe(200);
    expect(res.body.ready).toBe(true);
  });

  it("GET /api returns API info", async () => {
    const res = await request(app).get("/api");
    expect(res.status).toBe(200);
    expect(res.body.name).toBe("hotel-availability-gateway");
    expect(res.body.endpoints.rooms.search).toBe("POST /api/v1/rooms/search");
  });

  it("unknown routes get the error envelope", async () => {
    const res = await request(app).get("/api/v2/nothing");
    expect(res.status).toBe(404);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe("RESOURCE_NOT_FOUND");
    expect(res.body.error.message).toBe("Route GET /api/v2/nothing not found");
    expect(res.body.meta.transactionId).toBe(res.headers["x-request-id"]);
  });

  it("GET /metrics exposes Prometheus text", async () => {
    await request(app).get("/api");
    const res = await request(app).get("/metrics");
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/plain");
    expect(res.text).toContain("# TYPE http_requests_total counter");
  });
});
