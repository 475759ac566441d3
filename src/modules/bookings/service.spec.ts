import { beforeEach, describe, expect, it } from "vitest";
import {
  actorFor,
  createBooking,
  createHost,
  createUser,
  createVehicle,
} from "../../../test/support/fixtures.js";
import { createTestContainer } from "../../../test/support/fakes.js";
import { ForbiddenError, NotFoundError, StateError } from "../../domain/errors.js";
import {
  cancellationTerms,
  createBookingService,
  isCancellable,
  isReviewable,
  refundDue,
  type BookingService,
} from "./service.js";

const renter = createUser();
const host = createHost();
const admin = createUser({ id: "user-admin", email: "admin@example.com", phone: "9000000009", role: "admin" });

const BOOKED_AT = "2025-02-20T09:00:00Z";

describe("booking lifecycle", () => {
  let ctx: ReturnType<typeof createTestContainer>;
  let service: BookingService;

  beforeEach(() => {
    ctx = createTestContainer(BOOKED_AT);
    ctx.store.seed({ users: [renter, host, admin], vehicles: [createVehicle()] });
    service = createBookingService(ctx.container);
  });

  describe("cancellationTerms", () => {
    const booking = { totalPrice: 1000, createdAt: new Date(BOOKED_AT) };

    it("should be free inside the first hour", () => {
      expect(cancellationTerms(booking, new Date("2025-02-20T09:59:59Z"))).toEqual({
        fee: 0,
        refundAmount: 1000,
      });
    });

    it("should charge 10% from the first hour on", () => {
      expect(cancellationTerms(booking, new Date("2025-02-20T10:00:00Z"))).toEqual({
        fee: 100,
        refundAmount: 900,
      });
    });
  });

  describe("cancelBooking", () => {
    it("should refund the full total 30 minutes after booking", async () => {
      ctx.store.seed({ bookings: [createBooking()] });
      ctx.clock.advanceMinutes(30);

      const result = await service.cancelBooking(actorFor(renter), "booking-1");

      expect(result.fee).toBe(0);
      expect(result.refundAmount).toBe(854);
      expect(result.booking).toMatchObject({
        status: "Cancelled",
        refundStatus: "Pending",
        depositRefundStatus: "NotApplicable",
        cancellationFee: 0,
      });
    });

    it("should keep a 10% fee two hours after booking", async () => {
      ctx.store.seed({ bookings: [createBooking({ totalPrice: 1000 })] });
      ctx.clock.advanceMinutes(120);

      const result = await service.cancelBooking(actorFor(renter), "booking-1");

      expect(result.fee).toBe(100);
      expect(result.refundAmount).toBe(900);
      expect(result.booking.cancelledAt?.toISOString()).toBe("2025-02-20T11:00:00.000Z");
      expect(ctx.notifier.notifyBookingEvent).toHaveBeenCalledWith({
        userId: "user-renter",
        type: "booking.cancelled",
        bookingId: "booking-1",
        amount: 900,
      });
    });

    it("should hide other customers' bookings", async () => {
      ctx.store.seed({ bookings: [createBooking({ customerId: "user-someone-else" })] });

      await expect(service.cancelBooking(actorFor(renter), "booking-1")).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it.each(["Cancelled", "Completed"] as const)("should never reopen a %s booking", async (status) => {
      ctx.store.seed({ bookings: [createBooking({ status })] });

      await expect(service.cancelBooking(actorFor(renter), "booking-1")).rejects.toBeInstanceOf(
        StateError
      );
      expect(ctx.store.tables.bookings.get("booking-1")?.status).toBe(status);
    });

    it("should refuse a rental that has already ended", async () => {
      ctx.store.seed({ bookings: [createBooking()] });
      ctx.clock.set("2025-03-05T00:00:00Z");

      await expect(service.cancelBooking(actorFor(renter), "booking-1")).rejects.toMatchObject({
        status: 409,
        message: "Booking has already been completed and cannot be cancelled.",
      });
      expect(ctx.store.tables.bookings.get("booking-1")).toMatchObject({
        status: "Confirmed",
        refundStatus: "NotApplicable",
        depositRefundStatus: "Pending",
      });
      expect(ctx.notifier.notifyBookingEvent).not.toHaveBeenCalled();
    });
  });

  describe("isCancellable", () => {
    const booking = createBooking();

    it("should allow a confirmed rental until its end", () => {
      expect(isCancellable(booking, new Date("2025-03-01T12:59:00Z"))).toBe(true);
      expect(isCancellable(booking, new Date("2025-03-01T13:00:00Z"))).toBe(false);
    });

    it("should refuse cancelled bookings", () => {
      expect(isCancellable({ ...booking, status: "Cancelled" }, new Date(BOOKED_AT))).toBe(false);
    });
  });

  describe("processRefund", () => {
    it("should process once and refuse the second time without changes", async () => {
      ctx.store.seed({
        bookings: [
          createBooking({ status: "Cancelled", refundStatus: "Pending", cancellationFee: 85 }),
        ],
      });

      const first = await service.processRefund(actorFor(admin), "booking-1");
      expect(first.refundStatus).toBe("Processed");
      const snapshot = structuredClone(ctx.store.tables.bookings.get("booking-1"));

      await expect(service.processRefund(actorFor(admin), "booking-1")).rejects.toBeInstanceOf(
        StateError
      );
      expect(ctx.store.tables.bookings.get("booking-1")).toEqual(snapshot);
      expect(ctx.audit.entries).toHaveLength(1);
      expect(ctx.notifier.notifyBookingEvent).toHaveBeenCalledWith(
        expect.objectContaining({ type: "refund.processed", amount: 769 })
      );
    });

    it("should refuse a booking that was never cancelled", async () => {
      ctx.store.seed({ bookings: [createBooking()] });

      await expect(service.processRefund(actorFor(admin), "booking-1")).rejects.toBeInstanceOf(
        StateError
      );
    });

    it("should be admin only", async () => {
      ctx.store.seed({ bookings: [createBooking({ status: "Cancelled", refundStatus: "Pending" })] });

      await expect(service.processRefund(actorFor(renter), "booking-1")).rejects.toBeInstanceOf(
        ForbiddenError
      );
    });
  });

  describe("processDepositRefund", () => {
    it("should move a pending deposit to processed exactly once", async () => {
      ctx.store.seed({ bookings: [createBooking()] });

      const updated = await service.processDepositRefund(actorFor(admin), "booking-1");
      expect(updated.depositRefundStatus).toBe("Processed");
      expect(updated.totalPrice).toBe(854);

      await expect(
        service.processDepositRefund(actorFor(admin), "booking-1")
      ).rejects.toBeInstanceOf(StateError);
    });

    it("should refuse a cancelled booking's deposit", async () => {
      ctx.store.seed({
        bookings: [createBooking({ status: "Cancelled", depositRefundStatus: "NotApplicable" })],
      });

      await expect(
        service.processDepositRefund(actorFor(admin), "booking-1")
      ).rejects.toBeInstanceOf(StateError);
    });
  });

  it("should compute the refund due from the stored fee", () => {
    expect(refundDue({ totalPrice: 1000, cancellationFee: 100 })).toBe(900);
    expect(refundDue({ totalPrice: 1000, cancellationFee: null })).toBe(1000);
  });

  describe("isReviewable", () => {
    const now = new Date("2025-03-05T00:00:00Z");
    const ended = { status: "Confirmed" as const, end: new Date("2025-03-04T00:00:00Z") };

    it("should allow an ended confirmed booking without a review", () => {
      expect(isReviewable(ended, false, now)).toBe(true);
      expect(isReviewable({ ...ended, end: now }, false, now)).toBe(true);
    });

    it("should refuse reviewed, running or cancelled bookings", () => {
      expect(isReviewable(ended, true, now)).toBe(false);
      expect(isReviewable({ ...ended, end: new Date("2025-03-06T00:00:00Z") }, false, now)).toBe(false);
      expect(isReviewable({ ...ended, status: "Cancelled" }, false, now)).toBe(false);
    });
  });

  describe("listMyBookings", () => {
    it("should list newest first with review eligibility", async () => {
      ctx.clock.set("2025-03-10T00:00:00Z");
      ctx.store.seed({
        bookings: [
          createBooking(),
          createBooking({
            id: "booking-2",
            paymentId: "ch_test_2",
            start: new Date("2025-03-20T10:00:00Z"),
            end: new Date("2025-03-20T12:00:00Z"),
          }),
        ],
      });

      const rows = await service.listMyBookings(actorFor(renter));

      expect(rows.map((r) => r.id)).toEqual(["booking-2", "booking-1"]);
      expect(rows[0]).toMatchObject({ isReviewable: false, isCompleted: false, isCancellable: true });
      expect(rows[1]).toMatchObject({
        start: "2025-03-01 10:00",
        isReviewable: true,
        isCompleted: true,
        isCancellable: false,
        vehicle: { code: "PUN-SWIFT-01" },
      });
    });
  });

  describe("getReceipt", () => {
    it("should split the stored totals into receipt lines", async () => {
      ctx.store.seed({ bookings: [createBooking()] });

      const receipt = await service.getReceipt(actorFor(renter), "booking-1");

      expect(receipt).toMatchObject({
        bookingId: "booking-1",
        isCancellationRefund: false,
        billedHours: 3,
        subtotal: 300,
        tax: 54,
        deposit: 500,
        total: 854,
        host: { name: "Vikram Shah" },
      });
    });

    it("should flag a cancellation receipt", async () => {
      ctx.store.seed({ bookings: [createBooking({ status: "Cancelled", refundStatus: "Pending" })] });

      const receipt = await service.getReceipt(actorFor(renter), "booking-1");
      expect(receipt.isCancellationRefund).toBe(true);
    });
  });
});
