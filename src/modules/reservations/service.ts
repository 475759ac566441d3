// src/modules/reservations/service.ts
/**
 * Two-phase reservation: createOrder quotes the interval and opens a gateway order;
 * the client captures the payment directly with the gateway; confirmBooking re-verifies
 * the payment and the price server-side and only then writes the booking.
 */
import { nanoid } from "nanoid";

import { errorMessage, logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import {
  AppError,
  ConflictError,
  NotFoundError,
  ReconciliationError,
  ValidationError,
} from "../../domain/errors.js";
import { fromMinorUnits, toMinorUnits } from "../../domain/money.js";
import type { Actor } from "../../middlewares/auth.js";
import type { VehicleRecord } from "../../store/types.js";
import { parseInterval } from "../../utils/dates.js";
import { isAvailable } from "../availability/service.js";
import type { GatewayPayment } from "../payments/gateway.js";
import { quoteFor, type Quote } from "../pricing/calc.js";
import type { PendingQuote } from "../quotes/store.js";

/** Largest difference (whole units) tolerated between the paid total and the recomputed one. */
export const PRICE_TOLERANCE = 1;

export type ReservationDeps = Pick<
  Container,
  "store" | "quotes" | "gateway" | "notifier" | "clock" | "currency" | "taxRate"
>;

export type OrderRequest = {
  vehicleCode?: string | null;
  start?: string | Date | null;
  end?: string | Date | null;
};

export type OrderResult = {
  orderId: string;
  clientSecret: string;
  /** Minor units */
  amount: number;
  currency: string;
  quote: Quote;
  prefill: { name: string; email: string; contact: string };
};

export type ConfirmRequest = {
  paymentId?: string | null;
  orderId?: string | null;
};

export type ConfirmResult = { bookingId: string; total: number };

function requireInterval(start: OrderRequest["start"], end: OrderRequest["end"]) {
  const interval = parseInterval(start, end);
  if (!interval) {
    throw new ValidationError("Invalid booking dates: end must be after start", undefined, "INVALID_WINDOW");
  }
  return interval;
}

/** Why a payment cannot back the pending quote, or null when it can. */
export function paymentMismatch(
  payment: GatewayPayment | null,
  pending: Pick<PendingQuote, "orderId" | "expectedTotal">,
  orderId: string
): string | null {
  if (!payment) return "payment not found";
  if (payment.orderId !== orderId || pending.orderId !== orderId) return "order id mismatch";
  if (payment.amountMinor !== toMinorUnits(pending.expectedTotal)) {
    return `amount ${fromMinorUnits(payment.amountMinor)} != ${pending.expectedTotal}`;
  }
  if (payment.status !== "captured") return `status ${payment.status}`;
  return null;
}

export function createReservationService(deps: ReservationDeps) {
  const { store, quotes, gateway, notifier, clock, currency, taxRate } = deps;

  async function loadBookable(vehicleCode: string): Promise<VehicleRecord> {
    const vehicle = await store.vehicles.findByCode(vehicleCode);
    if (!vehicle) throw new NotFoundError("Vehicle not found", "VEHICLE_NOT_FOUND");
    if (!vehicle.isAvailable) {
      throw new ConflictError("Vehicle is not accepting bookings", { vehicleCode });
    }
    return vehicle;
  }

  /** Price an interval without opening an order. */
  async function previewQuote(input: OrderRequest) {
    if (!input.vehicleCode || !input.start || !input.end) {
      throw new ValidationError("Missing booking details.");
    }
    const { start, end } = requireInterval(input.start, input.end);
    const vehicle = await loadBookable(input.vehicleCode);
    const available = await isAvailable(store.bookings, vehicle.id, start, end);
    const quote = quoteFor(vehicle, start, end, taxRate);

    logger.debug("pricing.quote", { vehicleId: vehicle.id, total: quote.total, available });
    return { vehicleCode: vehicle.code, available, quote };
  }

  async function createOrder(actor: Actor, input: OrderRequest): Promise<OrderResult> {
    if (!input.vehicleCode || !input.start || !input.end) {
      throw new ValidationError("Missing booking details.");
    }
    const { start, end } = requireInterval(input.start, input.end);
    const vehicle = await loadBookable(input.vehicleCode);

    if (!(await isAvailable(store.bookings, vehicle.id, start, end))) {
      throw new ConflictError("Vehicle is booked for these times.", { vehicleCode: vehicle.code });
    }

    const quote = quoteFor(vehicle, start, end, taxRate);
    const receipt = `rcpt_${actor.userId}_${nanoid(10)}`;
    const order = await gateway.createOrder({
      amountMinor: toMinorUnits(quote.total),
      currency,
      receipt,
    });

    await quotes.put(actor.sessionId, {
      customerId: actor.userId,
      vehicleId: vehicle.id,
      vehicleCode: vehicle.code,
      start,
      end,
      orderId: order.orderId,
      expectedTotal: quote.total,
      expectedDeposit: quote.deposit,
      createdAt: clock.now(),
    });

    logger.info("reservations.order_created", {
      userId: actor.userId,
      vehicleId: vehicle.id,
      orderId: order.orderId,
      total: quote.total,
      receipt,
    });

    const customer = await store.users.findById(actor.userId);
    return {
      orderId: order.orderId,
      clientSecret: order.clientSecret,
      amount: order.amountMinor,
      currency: order.currency,
      quote,
      prefill: {
        name: customer ? `${customer.firstName} ${customer.lastName}`.trim() : "Rider",
        email: customer?.email ?? "",
        contact: customer?.phone ?? "",
      },
    };
  }

  async function confirmBooking(actor: Actor, input: ConfirmRequest): Promise<ConfirmResult> {
    // a) the quote is single-use: taken before anything else can fail
    const pending = await quotes.pop(actor.sessionId, actor.userId);
    if (!pending) {
      throw new ValidationError("Session expired or order was not initialized.", undefined, "SESSION_EXPIRED");
    }

    // b)
    const { paymentId, orderId } = input;
    if (!paymentId || !orderId) {
      throw new ValidationError("Payment verification data missing.");
    }

    // c) the gateway is the only source of truth for the payment
    const payment = await gateway.fetchPayment(paymentId);
    const mismatch = paymentMismatch(payment, pending, orderId);
    if (mismatch) {
      logger.error("reservations.reconciliation_failed", {
        userId: actor.userId,
        paymentId,
        orderId,
        reason: mismatch,
      });
      throw new ReconciliationError(
        `Payment verification failed. Please contact support with Payment ID: ${paymentId}.`,
        paymentId,
        { details: { reason: mismatch } }
      );
    }

    // d-f) atomic per vehicle
    try {
      const booking = await store.transaction(async (tx) => {
        await tx.vehicles.claimForReservation(pending.vehicleId);
        const vehicle = await tx.vehicles.findById(pending.vehicleId);
        if (!vehicle) throw new NotFoundError("Vehicle not found", "VEHICLE_NOT_FOUND");

        // switched off (host toggle or admin block) after the order was opened
        if (!vehicle.isAvailable) {
          throw new ConflictError(
            "Vehicle is no longer accepting bookings. Refund will be processed shortly.",
            { paymentId }
          );
        }

        if (!(await isAvailable(tx.bookings, vehicle.id, pending.start, pending.end))) {
          throw new ConflictError(
            "Vehicle was booked by another user during payment. Refund will be processed shortly.",
            { paymentId }
          );
        }

        const quote = quoteFor(vehicle, pending.start, pending.end, taxRate);
        if (Math.abs(quote.total - pending.expectedTotal) > PRICE_TOLERANCE) {
          throw new ReconciliationError(
            "Price calculation mismatch after payment. Contact support.",
            paymentId,
            {
              code: "PRICE_MISMATCH",
              status: 409,
              details: { expected: pending.expectedTotal, recomputed: quote.total },
            }
          );
        }

        return tx.bookings.create({
          customerId: actor.userId,
          vehicleId: vehicle.id,
          start: pending.start,
          end: pending.end,
          totalPrice: quote.total,
          depositAmount: quote.deposit,
          status: "Confirmed",
          paymentId,
          orderId,
          refundStatus: "NotApplicable",
          depositRefundStatus: "Pending",
          cancelledAt: null,
          cancellationFee: null,
        });
      });

      logger.info("reservations.confirmed", {
        bookingId: booking.id,
        vehicleId: booking.vehicleId,
        paymentId,
        orderId,
        total: booking.totalPrice,
      });
      await notifier.notifyBookingEvent({
        userId: actor.userId,
        type: "booking.confirmed",
        bookingId: booking.id,
      });

      return { bookingId: booking.id, total: booking.totalPrice };
    } catch (err) {
      if (err instanceof ConflictError) {
        // money moved without a booking; refunding is a support follow-up
        logger.warn("reservations.lost_race", { paymentId, orderId, vehicleId: pending.vehicleId });
        throw err;
      }
      if (err instanceof AppError) throw err;
      logger.error("reservations.persist_failed", { paymentId, orderId, err: errorMessage(err) });
      throw new ReconciliationError(
        "Payment captured, but failed to save booking. Contact support for assistance.",
        paymentId,
        { code: "BOOKING_SAVE_FAILED", status: 500 }
      );
    }
  }

  return { previewQuote, createOrder, confirmBooking };
}

export type ReservationService = ReturnType<typeof createReservationService>;
