import { beforeEach, describe, expect, it } from "vitest";
import {
  actorFor,
  createBooking,
  createHost,
  createUser,
  createVehicle,
} from "../../../test/support/fixtures.js";
import { createTestContainer } from "../../../test/support/fakes.js";
import {
  ConflictError,
  ExternalServiceError,
  NotFoundError,
  ReconciliationError,
  ValidationError,
} from "../../domain/errors.js";
import { createReservationService, type ReservationService } from "./service.js";

const renter = createUser();
const otherRenter = createUser({ id: "user-renter-2", email: "second@example.com", phone: "9000000003" });
const host = createHost();

const WINDOW = { start: "2025-03-02 10:00", end: "2025-03-02 13:00" };

describe("reservation workflow", () => {
  let ctx: ReturnType<typeof createTestContainer>;
  let service: ReservationService;

  beforeEach(() => {
    ctx = createTestContainer("2025-03-01T08:00:00Z");
    ctx.store.seed({ users: [renter, otherRenter, host], vehicles: [createVehicle()] });
    service = createReservationService(ctx.container);
  });

  describe("createOrder", () => {
    it("should open a gateway order for the quoted total and remember the quote", async () => {
      const result = await service.createOrder(actorFor(renter), {
        vehicleCode: "PUN-SWIFT-01",
        ...WINDOW,
      });

      expect(result.amount).toBe(85_400);
      expect(result.currency).toBe("inr");
      expect(result.quote.total).toBe(854);
      expect(result.prefill).toEqual({
        name: "Asha Rao",
        email: "renter@example.com",
        contact: "9000000001",
      });
      expect(ctx.gateway.createOrder).toHaveBeenCalledWith(
        expect.objectContaining({ amountMinor: 85_400, currency: "inr" })
      );

      const pending = await ctx.quotes.get("sess-user-renter");
      expect(pending).toMatchObject({
        customerId: "user-renter",
        vehicleId: "vehicle-1",
        orderId: result.orderId,
        expectedTotal: 854,
        expectedDeposit: 500,
      });
    });

    it("should reject missing details without calling the gateway", async () => {
      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "PUN-SWIFT-01", start: WINDOW.start })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(ctx.gateway.createOrder).not.toHaveBeenCalled();
    });

    it("should reject an interval that ends before it starts", async () => {
      await expect(
        service.createOrder(actorFor(renter), {
          vehicleCode: "PUN-SWIFT-01",
          start: WINDOW.end,
          end: WINDOW.start,
        })
      ).rejects.toMatchObject({ status: 400, code: "INVALID_WINDOW" });
    });

    it("should 404 on an unknown vehicle code", async () => {
      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "NOPE", ...WINDOW })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should refuse a vehicle the host switched off", async () => {
      ctx.store.seed({ vehicles: [createVehicle({ isAvailable: false })] });

      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "PUN-SWIFT-01", ...WINDOW })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("should refuse an interval overlapping a confirmed booking", async () => {
      ctx.store.seed({
        bookings: [
          createBooking({
            start: new Date("2025-03-02T12:00:00Z"),
            end: new Date("2025-03-02T15:00:00Z"),
          }),
        ],
      });

      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "PUN-SWIFT-01", ...WINDOW })
      ).rejects.toMatchObject({ status: 409, message: "Vehicle is booked for these times." });
      expect(await ctx.quotes.get("sess-user-renter")).toBeNull();
    });

    it("should not store a quote when the gateway fails", async () => {
      ctx.gateway.createOrder.mockRejectedValueOnce(new ExternalServiceError("timeout"));

      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "PUN-SWIFT-01", ...WINDOW })
      ).rejects.toBeInstanceOf(ExternalServiceError);
      expect(await ctx.quotes.get("sess-user-renter")).toBeNull();
    });

    it("should report a gateway failure as a server error", async () => {
      ctx.gateway.createOrder.mockRejectedValueOnce(
        new ExternalServiceError("Payment gateway unavailable, please retry")
      );

      await expect(
        service.createOrder(actorFor(renter), { vehicleCode: "PUN-SWIFT-01", ...WINDOW })
      ).rejects.toMatchObject({ status: 500, code: "PAYMENT_GATEWAY_ERROR" });
    });
  });

  describe("confirmBooking", () => {
    async function orderAndCapture(actor = actorFor(renter), window = WINDOW) {
      const order = await service.createOrder(actor, { vehicleCode: "PUN-SWIFT-01", ...window });
      const payment = ctx.gateway.capture(order.orderId);
      return { order, payment };
    }

    it("should write a confirmed booking with the recomputed totals", async () => {
      const { order, payment } = await orderAndCapture();

      const result = await service.confirmBooking(actorFor(renter), {
        paymentId: payment.paymentId,
        orderId: order.orderId,
      });

      expect(result.total).toBe(854);
      const booking = await ctx.store.bookings.findById(result.bookingId);
      expect(booking).toMatchObject({
        customerId: "user-renter",
        vehicleId: "vehicle-1",
        totalPrice: 854,
        depositAmount: 500,
        status: "Confirmed",
        paymentId: payment.paymentId,
        orderId: order.orderId,
        refundStatus: "NotApplicable",
        depositRefundStatus: "Pending",
      });
      expect(booking?.start.toISOString()).toBe("2025-03-02T10:00:00.000Z");
      expect(ctx.notifier.notifyBookingEvent).toHaveBeenCalledWith({
        userId: "user-renter",
        type: "booking.confirmed",
        bookingId: result.bookingId,
      });
    });

    it("should fail a second confirm with session expired", async () => {
      const { order, payment } = await orderAndCapture();
      const input = { paymentId: payment.paymentId, orderId: order.orderId };
      await service.confirmBooking(actorFor(renter), input);

      await expect(service.confirmBooking(actorFor(renter), input)).rejects.toMatchObject({
        status: 400,
        message: "Session expired or order was not initialized.",
      });
      expect(ctx.store.tables.bookings.size).toBe(1);
    });

    it("should consume the quote even when the payment ids are missing", async () => {
      await orderAndCapture();

      await expect(
        service.confirmBooking(actorFor(renter), { paymentId: "", orderId: null })
      ).rejects.toMatchObject({ message: "Payment verification data missing." });
      expect(await ctx.quotes.get("sess-user-renter")).toBeNull();
    });

    it("should surface the payment id when the amount does not match", async () => {
      const order = await service.createOrder(actorFor(renter), {
        vehicleCode: "PUN-SWIFT-01",
        ...WINDOW,
      });
      const payment = ctx.gateway.capture(order.orderId, { amountMinor: 50_000 });

      const err = await service
        .confirmBooking(actorFor(renter), { paymentId: payment.paymentId, orderId: order.orderId })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ReconciliationError);
      expect(err).toMatchObject({ status: 402, paymentId: payment.paymentId });
      expect(ctx.store.tables.bookings.size).toBe(0);
    });

    it("should reject a payment that is not captured", async () => {
      const order = await service.createOrder(actorFor(renter), {
        vehicleCode: "PUN-SWIFT-01",
        ...WINDOW,
      });
      const payment = ctx.gateway.capture(order.orderId, { status: "authorized" });

      await expect(
        service.confirmBooking(actorFor(renter), {
          paymentId: payment.paymentId,
          orderId: order.orderId,
        })
      ).rejects.toBeInstanceOf(ReconciliationError);
    });

    it("should reject a payment that belongs to another order", async () => {
      const { payment } = await orderAndCapture();

      await expect(
        service.confirmBooking(actorFor(renter), { paymentId: payment.paymentId, orderId: "pi_other" })
      ).rejects.toMatchObject({ code: "PAYMENT_VERIFICATION_FAILED", paymentId: payment.paymentId });
    });

    it("should refuse to book when the price changed after payment", async () => {
      const { order, payment } = await orderAndCapture();
      ctx.store.seed({ vehicles: [createVehicle({ basePricePerHour: 150 })] });

      await expect(
        service.confirmBooking(actorFor(renter), {
          paymentId: payment.paymentId,
          orderId: order.orderId,
        })
      ).rejects.toMatchObject({ status: 409, code: "PRICE_MISMATCH", paymentId: payment.paymentId });
      expect(ctx.store.tables.bookings.size).toBe(0);
    });

    it("should refuse to book a vehicle switched off after the order", async () => {
      const { order, payment } = await orderAndCapture();
      ctx.store.seed({ vehicles: [createVehicle({ isAvailable: false })] });

      await expect(
        service.confirmBooking(actorFor(renter), {
          paymentId: payment.paymentId,
          orderId: order.orderId,
        })
      ).rejects.toMatchObject({
        status: 409,
        message: "Vehicle is no longer accepting bookings. Refund will be processed shortly.",
        details: { paymentId: payment.paymentId },
      });
      expect(ctx.store.tables.bookings.size).toBe(0);
    });

    it("should let exactly one of two concurrent overlapping confirms win", async () => {
      const first = await orderAndCapture(actorFor(renter));
      const second = await orderAndCapture(actorFor(otherRenter), {
        start: "2025-03-02 12:00",
        end: "2025-03-02 14:00",
      });

      const results = await Promise.allSettled([
        service.confirmBooking(actorFor(renter), {
          paymentId: first.payment.paymentId,
          orderId: first.order.orderId,
        }),
        service.confirmBooking(actorFor(otherRenter), {
          paymentId: second.payment.paymentId,
          orderId: second.order.orderId,
        }),
      ]);

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(ConflictError);
      expect(ctx.store.tables.bookings.size).toBe(1);
    });

    it("should accept back-to-back intervals", async () => {
      const first = await orderAndCapture(actorFor(renter));
      await service.confirmBooking(actorFor(renter), {
        paymentId: first.payment.paymentId,
        orderId: first.order.orderId,
      });

      const second = await orderAndCapture(actorFor(otherRenter), {
        start: "2025-03-02 13:00",
        end: "2025-03-02 15:00",
      });
      const result = await service.confirmBooking(actorFor(otherRenter), {
        paymentId: second.payment.paymentId,
        orderId: second.order.orderId,
      });

      expect(result.bookingId).toBeTruthy();
      expect(ctx.store.tables.bookings.size).toBe(2);
    });
  });

  it("should preview a quote with availability", async () => {
    const preview = await service.previewQuote({ vehicleCode: "PUN-SWIFT-01", ...WINDOW });

    expect(preview.available).toBe(true);
    expect(preview.quote.total).toBe(854);
  });
});
