import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";

import { createBooking, createHost, createUser, createVehicle } from "../test/support/fixtures.js";
import { createTestContainer } from "../test/support/fakes.js";
import { createApp } from "./app.js";
import type { UserRecord } from "./store/types.js";
import { signAccessToken } from "./modules/auth/tokens.js";
import { createRouter } from "./routes.js";

const renter = createUser();
const admin = createUser({ id: "user-admin", email: "admin@example.com", phone: "9000000009", role: "admin" });

function bearer(user: UserRecord, sid = `sess-${user.id}`) {
  return `Bearer ${signAccessToken({ sub: user.id, role: user.role, sid })}`;
}

describe("http api", () => {
  let ctx: ReturnType<typeof createTestContainer>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    ctx = createTestContainer("2025-03-01T08:00:00Z");
    ctx.store.seed({ users: [renter, admin, createHost()], vehicles: [createVehicle()] });
    const ok = async () => ({ status: "ok" as const });
    app = createApp(ctx.container, createRouter(ctx.container, { mongo: ok, redis: ok }));
  });

  it("should answer health checks", async () => {
    const res = await request(app).get("/health/deps");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ mongo: "ok", redis: "ok" });
  });

  it("should reject unauthenticated orders", async () => {
    const res = await request(app)
      .post("/reservations/orders")
      .send({ vehicleCode: "PUN-SWIFT-01", start: "2025-03-01 10:00", end: "2025-03-01 13:00" });

    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe("UNAUTHORIZED");
  });

  it("should book through order and confirm", async () => {
    const order = await request(app)
      .post("/reservations/orders")
      .set("authorization", bearer(renter))
      .send({ vehicleCode: "PUN-SWIFT-01", start: "2025-03-01 10:00", end: "2025-03-01 13:00" });

    expect(order.status).toBe(201);
    expect(order.body).toMatchObject({ orderId: "pi_test_1", amount: 85400, currency: "inr" });

    const payment = ctx.gateway.capture("pi_test_1");
    const confirm = await request(app)
      .post("/reservations/confirm")
      .set("authorization", bearer(renter))
      .send({ paymentId: payment.paymentId, orderId: "pi_test_1" });

    expect(confirm.status).toBe(201);
    expect(confirm.body).toEqual({ success: true, bookingId: "booking-1", total: 854 });

    const again = await request(app)
      .post("/reservations/confirm")
      .set("authorization", bearer(renter))
      .send({ paymentId: payment.paymentId, orderId: "pi_test_1" });
    expect(again.status).toBe(400);
    expect(again.body.error.code).toBe("SESSION_EXPIRED");
  });

  it("should not let another session confirm the quote", async () => {
    await request(app)
      .post("/reservations/orders")
      .set("authorization", bearer(renter))
      .send({ vehicleCode: "PUN-SWIFT-01", start: "2025-03-01 10:00", end: "2025-03-01 13:00" });
    const payment = ctx.gateway.capture("pi_test_1");

    const res = await request(app)
      .post("/reservations/confirm")
      .set("authorization", bearer(renter, "sess-other-device"))
      .send({ paymentId: payment.paymentId, orderId: "pi_test_1" });

    expect(res.status).toBe(400);
    expect(ctx.store.tables.bookings.size).toBe(0);
  });

  it("should surface the payment id on a reconciliation failure", async () => {
    await request(app)
      .post("/reservations/orders")
      .set("authorization", bearer(renter))
      .send({ vehicleCode: "PUN-SWIFT-01", start: "2025-03-01 10:00", end: "2025-03-01 13:00" });
    const payment = ctx.gateway.capture("pi_test_1", { amountMinor: 100 });

    const res = await request(app)
      .post("/reservations/confirm")
      .set("authorization", bearer(renter))
      .send({ paymentId: payment.paymentId, orderId: "pi_test_1" });

    expect(res.status).toBe(402);
    expect(res.body.error).toMatchObject({
      code: "PAYMENT_VERIFICATION_FAILED",
      paymentId: "ch_for_pi_test_1",
    });
  });

  it("should map a taken interval to 409", async () => {
    ctx.store.seed({ bookings: [createBooking()] });

    const res = await request(app)
      .post("/reservations/orders")
      .set("authorization", bearer(renter))
      .send({ vehicleCode: "PUN-SWIFT-01", start: "2025-03-01 12:00", end: "2025-03-01 14:00" });

    expect(res.status).toBe(409);
    expect(res.body.error.message).toBe("Vehicle is booked for these times.");
  });

  it("should cancel and then refund through the admin route", async () => {
    ctx.store.seed({ bookings: [createBooking({ createdAt: new Date("2025-03-01T07:45:00Z") })] });

    const cancel = await request(app)
      .post("/bookings/booking-1/cancel")
      .set("authorization", bearer(renter));
    expect(cancel.status).toBe(200);
    expect(cancel.body).toMatchObject({ fee: 0, refundAmount: 854, status: "Cancelled" });

    const forbidden = await request(app)
      .post("/admin/bookings/booking-1/refund")
      .set("authorization", bearer(renter));
    expect(forbidden.status).toBe(403);

    const refund = await request(app)
      .post("/admin/bookings/booking-1/refund")
      .set("authorization", bearer(admin));
    expect(refund.status).toBe(200);
    expect(refund.body.refundStatus).toBe("Processed");

    const twice = await request(app)
      .post("/admin/bookings/booking-1/refund")
      .set("authorization", bearer(admin));
    expect(twice.status).toBe(409);
    expect(twice.body.error.code).toBe("INVALID_STATE");
  });

  it("should validate review bodies", async () => {
    const res = await request(app)
      .post("/bookings/booking-1/review")
      .set("authorization", bearer(renter))
      .send({ rating: "lots" });

    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("UNPROCESSABLE_ENTITY");
  });

  it("should list public inventory", async () => {
    const res = await request(app).get("/vehicles/inventory");

    expect(res.status).toBe(200);
    expect(res.body.items).toHaveLength(1);
    expect(res.body.items[0]).toMatchObject({ code: "PUN-SWIFT-01", booked: [] });
  });

  it("should let an approved host list and edit vehicles", async () => {
    const host = createHost();
    const created = await request(app)
      .post("/host/vehicles")
      .set("authorization", bearer(host))
      .send({
        name: "Creta",
        brand: "Hyundai",
        type: "SUV",
        fuel: "Petrol",
        gear: "Automatic",
        city: "Pune",
        basePricePerHour: "150",
      });

    expect(created.status).toBe(201);
    expect(created.body.vehicle).toMatchObject({
      id: "vehicle-2",
      code: "creta-pune-user-host-2",
      basePricePerHour: 150,
      features: [],
    });

    const empty = await request(app)
      .patch("/host/vehicles/vehicle-2")
      .set("authorization", bearer(host))
      .send({});
    expect(empty.status).toBe(422);

    const edited = await request(app)
      .patch("/host/vehicles/vehicle-2")
      .set("authorization", bearer(host))
      .send({ basePricePerHour: 160 });
    expect(edited.status).toBe(200);
    expect(edited.body.vehicle.basePricePerHour).toBe(160);

    const insights = await request(app).get("/host/vehicles/insights").set("authorization", bearer(host));
    expect(insights.status).toBe(200);
    expect(insights.body.action).toBe("green");
  });

  it("should keep renters out of host vehicle routes", async () => {
    const res = await request(app).get("/host/vehicles").set("authorization", bearer(renter));
    expect(res.status).toBe(403);
  });

  it("should 404 unknown routes", async () => {
    const res = await request(app).get("/nope");
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
  });
});
