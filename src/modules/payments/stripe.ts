// src/modules/payments/stripe.ts
/** Stripe-backed gateway: order = PaymentIntent, payment = the Charge it produced. */
import Stripe from "stripe";

import { errorMessage, logger } from "../../config/logger.js";
import { ExternalServiceError } from "../../domain/errors.js";
import type { GatewayPayment, PaymentGateway, PaymentStatus } from "./gateway.js";

function chargeStatus(charge: Stripe.Charge): PaymentStatus {
  if (charge.status === "failed") return "failed";
  if (charge.status === "pending") return "pending";
  return charge.captured ? "captured" : "authorized";
}

function intentId(ref: Stripe.Charge["payment_intent"]): string | null {
  if (!ref) return null;
  return typeof ref === "string" ? ref : ref.id;
}

function gatewayFailure(op: string, err: unknown): ExternalServiceError {
  const details: Record<string, unknown> = { op };
  if (err instanceof Stripe.errors.StripeError) {
    details.type = err.type;
    if (err.requestId) details.requestId = err.requestId;
  }
  logger.error("payments.gateway_error", { op, err: errorMessage(err), ...details });
  return new ExternalServiceError("Payment gateway unavailable, please retry", details);
}

export function createStripeGateway(client: Stripe): PaymentGateway {
  return {
    async createOrder({ amountMinor, currency, receipt }) {
      let pi: Stripe.PaymentIntent;
      try {
        pi = await client.paymentIntents.create(
          {
            amount: amountMinor,
            currency,
            capture_method: "automatic",
            automatic_payment_methods: { enabled: true, allow_redirects: "never" },
            metadata: { receipt },
          },
          { idempotencyKey: receipt }
        );
      } catch (err) {
        throw gatewayFailure("createOrder", err);
      }
      if (!pi.client_secret) {
        throw new ExternalServiceError("Payment gateway returned no client secret", { orderId: pi.id });
      }
      return {
        orderId: pi.id,
        clientSecret: pi.client_secret,
        amountMinor: pi.amount,
        currency: pi.currency,
      };
    },

    async fetchPayment(paymentId): Promise<GatewayPayment | null> {
      try {
        const charge = await client.charges.retrieve(paymentId);
        return {
          paymentId: charge.id,
          orderId: intentId(charge.payment_intent),
          amountMinor: charge.amount,
          status: chargeStatus(charge),
        };
      } catch (err) {
        if (err instanceof Stripe.errors.StripeInvalidRequestError && err.code === "resource_missing") {
          return null;
        }
        throw gatewayFailure("fetchPayment", err);
      }
    },
  };
}
