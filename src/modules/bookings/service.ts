// src/modules/bookings/service.ts
import { logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import { isTerminal } from "../../domain/enums.js";
import { NotFoundError, StateError } from "../../domain/errors.js";
import { percentOf } from "../../domain/money.js";
import { assertRole, type Actor } from "../../middlewares/auth.js";
import type { BookingRecord } from "../../store/types.js";
import { formatInstant } from "../../utils/dates.js";
import { breakdownFromBooking } from "../pricing/calc.js";

/** Cancellations inside this window after booking are free. */
export const FREE_CANCEL_WINDOW_MS = 60 * 60 * 1000;
export const CANCELLATION_FEE_PCT = 10;

export type BookingDeps = Pick<Container, "store" | "clock" | "notifier" | "audit" | "taxRate">;

/** Fee and refund for cancelling `booking` at `now`. */
export function cancellationTerms(booking: Pick<BookingRecord, "totalPrice" | "createdAt">, now: Date) {
  const elapsed = now.getTime() - booking.createdAt.getTime();
  const fee = elapsed < FREE_CANCEL_WINDOW_MS ? 0 : percentOf(booking.totalPrice, CANCELLATION_FEE_PCT);
  return { fee, refundAmount: booking.totalPrice - fee };
}

/** Amount owed back on a cancelled booking: total less the fee fixed at cancellation. */
export function refundDue(booking: Pick<BookingRecord, "totalPrice" | "cancellationFee">): number {
  return booking.totalPrice - (booking.cancellationFee ?? 0);
}

/** Confirmed and not yet over. A rental past its end reads as completed. */
export function isCancellable(booking: Pick<BookingRecord, "status" | "end">, now: Date): boolean {
  return booking.status === "Confirmed" && booking.end.getTime() > now.getTime();
}

/** Confirmed, already ended, and not yet reviewed. */
export function isReviewable(
  booking: Pick<BookingRecord, "status" | "end">,
  hasReview: boolean,
  now: Date
): boolean {
  return booking.status === "Confirmed" && booking.end.getTime() <= now.getTime() && !hasReview;
}

export function createBookingService(deps: BookingDeps) {
  const { store, clock, notifier, audit, taxRate } = deps;

  async function ownBooking(actor: Actor, bookingId: string) {
    const booking = await store.bookings.findById(bookingId);
    // someone else's booking reads as missing
    if (!booking || booking.customerId !== actor.userId) {
      throw new NotFoundError("Booking not found or unauthorized.", "BOOKING_NOT_FOUND");
    }
    return booking;
  }

  async function cancelBooking(actor: Actor, bookingId: string) {
    const booking = await ownBooking(actor, bookingId);
    if (isTerminal(booking.status)) {
      throw new StateError(`Booking status '${booking.status}' cannot be cancelled.`, {
        status: booking.status,
      });
    }

    const now = clock.now();
    if (!isCancellable(booking, now)) {
      throw new StateError("Booking has already been completed and cannot be cancelled.", {
        status: "Completed",
      });
    }

    const { fee, refundAmount } = cancellationTerms(booking, now);
    const updated = await store.transaction(async (tx) => {
      // re-read under the transaction so a concurrent cancel cannot apply twice
      const current = await tx.bookings.findById(booking.id);
      if (!current || !isCancellable(current, now)) {
        throw new StateError("Booking is no longer active.");
      }
      return tx.bookings.update(booking.id, {
        status: "Cancelled",
        refundStatus: "Pending",
        depositRefundStatus: "NotApplicable",
        cancelledAt: now,
        cancellationFee: fee,
      });
    });
    if (!updated) throw new NotFoundError("Booking not found or unauthorized.", "BOOKING_NOT_FOUND");

    logger.info("bookings.cancelled", {
      bookingId: booking.id,
      userId: actor.userId,
      paymentId: booking.paymentId,
      fee,
      refundAmount,
    });
    await notifier.notifyBookingEvent({
      userId: actor.userId,
      type: "booking.cancelled",
      bookingId: booking.id,
      amount: refundAmount,
    });

    return { booking: updated, fee, refundAmount };
  }

  async function processRefund(actor: Actor, bookingId: string) {
    assertRole(actor, "admin", "Admin access required");
    const booking = await store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("Booking not found", "BOOKING_NOT_FOUND");
    if (booking.status !== "Cancelled" || booking.refundStatus === "Processed") {
      throw new StateError("Refund already processed or booking not cancelled.", {
        status: booking.status,
        refundStatus: booking.refundStatus,
      });
    }

    const updated = await store.transaction(async (tx) => {
      const current = await tx.bookings.findById(booking.id);
      if (!current || current.refundStatus === "Processed") {
        throw new StateError("Refund already processed or booking not cancelled.");
      }
      return tx.bookings.update(booking.id, { refundStatus: "Processed" });
    });
    if (!updated) throw new NotFoundError("Booking not found", "BOOKING_NOT_FOUND");

    const refundAmount = refundDue(booking);
    logger.info("admin.refund_processed", {
      bookingId: booking.id,
      paymentId: booking.paymentId,
      adminId: actor.userId,
    });
    await audit.record({
      actorId: actor.userId,
      action: "booking.refund_processed",
      target: { kind: "booking", id: booking.id },
      diff: { refundStatus: { from: booking.refundStatus, to: "Processed" } },
    });
    await notifier.notifyBookingEvent({
      userId: booking.customerId,
      type: "refund.processed",
      bookingId: booking.id,
      amount: refundAmount,
    });
    return updated;
  }

  async function processDepositRefund(actor: Actor, bookingId: string) {
    assertRole(actor, "admin", "Admin access required");
    const booking = await store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("Booking not found", "BOOKING_NOT_FOUND");
    if (booking.depositRefundStatus !== "Pending") {
      throw new StateError("Deposit refund already processed or not applicable.", {
        depositRefundStatus: booking.depositRefundStatus,
      });
    }

    const updated = await store.transaction(async (tx) => {
      const current = await tx.bookings.findById(booking.id);
      if (!current || current.depositRefundStatus !== "Pending") {
        throw new StateError("Deposit refund already processed or not applicable.");
      }
      return tx.bookings.update(booking.id, { depositRefundStatus: "Processed" });
    });
    if (!updated) throw new NotFoundError("Booking not found", "BOOKING_NOT_FOUND");

    logger.info("admin.deposit_refund_processed", {
      bookingId: booking.id,
      paymentId: booking.paymentId,
      deposit: booking.depositAmount,
      adminId: actor.userId,
    });
    await audit.record({
      actorId: actor.userId,
      action: "booking.deposit_refund_processed",
      target: { kind: "booking", id: booking.id },
      diff: { depositRefundStatus: { from: "Pending", to: "Processed" } },
    });
    await notifier.notifyBookingEvent({
      userId: booking.customerId,
      type: "deposit_refund.processed",
      bookingId: booking.id,
      amount: booking.depositAmount,
    });
    return updated;
  }

  /** Booking history, newest start first, with review eligibility. */
  async function listMyBookings(actor: Actor) {
    const bookings = await store.bookings.listByCustomer(actor.userId);
    const [vehicles, reviewed] = await Promise.all([
      store.vehicles.findManyByIds([...new Set(bookings.map((b) => b.vehicleId))]),
      store.reviews.reviewedBookingIds(bookings.map((b) => b.id)),
    ]);
    const byId = new Map(vehicles.map((v) => [v.id, v]));
    const now = clock.now();

    return bookings.map((b) => {
      const vehicle = byId.get(b.vehicleId);
      return {
        id: b.id,
        vehicle: vehicle
          ? { id: vehicle.id, code: vehicle.code, name: vehicle.name, brand: vehicle.brand }
          : null,
        start: formatInstant(b.start),
        end: formatInstant(b.end),
        totalPrice: b.totalPrice,
        depositAmount: b.depositAmount,
        status: b.status,
        refundStatus: b.refundStatus,
        depositRefundStatus: b.depositRefundStatus,
        // Confirmed and over: presented as completed without a status write
        isCompleted: b.status === "Completed" || (b.status === "Confirmed" && b.end <= now),
        isCancellable: isCancellable(b, now),
        isReviewable: isReviewable(b, reviewed.has(b.id), now),
      };
    });
  }

  async function getReceipt(actor: Actor, bookingId: string) {
    const booking = await ownBooking(actor, bookingId);
    const vehicle = await store.vehicles.findById(booking.vehicleId);
    const host = vehicle ? await store.users.findById(vehicle.hostId) : null;
    const customer = await store.users.findById(booking.customerId);

    return {
      bookingId: booking.id,
      paymentId: booking.paymentId,
      status: booking.status,
      isCancellationRefund: booking.status === "Cancelled" && booking.refundStatus !== "NotApplicable",
      period: { start: formatInstant(booking.start), end: formatInstant(booking.end) },
      vehicle: vehicle ? { code: vehicle.code, name: vehicle.name, brand: vehicle.brand } : null,
      host: host ? { name: `${host.firstName} ${host.lastName}`.trim(), phone: host.phone } : null,
      customer: customer
        ? { name: `${customer.firstName} ${customer.lastName}`.trim(), email: customer.email }
        : null,
      ...breakdownFromBooking(booking, taxRate),
    };
  }

  return {
    cancelBooking,
    processRefund,
    processDepositRefund,
    listMyBookings,
    getReceipt,
  };
}

export type BookingService = ReturnType<typeof createBookingService>;
