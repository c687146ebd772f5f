import { describe, it, expect } from "vitest";
import request from "supertest";
import { createApp } from "../app.js";
import { AnalyticsService } from "../services/analytics.service.js";
import { StubCapCorn, StubGateway, oneOptionPerWindow, reservationBody } from "./fixtures.js";

describe("POST /api/v1/reservations", () => {
  it("creates the reservation and answers 201", async () => {
    const capcorn = new StubCapCorn();
    const analytics = new AnalyticsService(100);
    const app = createApp({ gateway: new StubGateway(oneOptionPerWindow), capcorn, analytics });

    const res = await request(app).post("/api/v1/reservations").send(reservationBody());

    expect(res.status).toBe(201);
    expect(res.body.data).toEqual({
      success: true,
      message: "Reservation created successfully",
      reservationId: "RES-1",
    });
    expect(capcorn.reservationRequests[0]?.numberOfUnits).toBe(1);
    expect(capcorn.reservationRequests[0]?.source).toBe("Hackathon");
    expect(analytics.getSummary(1).totalRevenue).toBe(480);
  });

  it("answers 400 when CapCorn rejects the booking", async () => {
    const capcorn = new StubCapCorn({
      success: false,
      message: "Failed to create reservation: Room not available",
      errors: ["Room not available"],
    });
    const analytics = new AnalyticsService(100);
    const app = createApp({ gateway: new StubGateway(oneOptionPerWindow), capcorn, analytics });

    const res = await request(app).post("/api/v1/reservations").send(reservationBody());

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error).toEqual({
      code: "RESERVATION_REJECTED",
      message: "Failed to create reservation: Room not available",
      retryable: false,
      details: { errors: ["Room not available"] },
    });
    expect(analytics.getStats().totalReservationsInMemory).toBe(0);
  });

  it("validates the guest", async () => {
    const capcorn = new StubCapCorn();
    const app = createApp({ gateway: new StubGateway(oneOptionPerWindow), capcorn });
    const body = reservationBody();

    const res = await request(app)
      .post("/api/v1/reservations")
      .send({ ...body, guest: { ...body.guest, email: "not-an-email" } });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(res.body.error.details.fields["guest.email"]).toBe("Invalid email");
    expect(capcorn.reservationRequests).toHaveLength(0);
  });
});
