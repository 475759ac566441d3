/** Runtime collaborators shared by services and routers. */
import { env, getTaxRate } from "./config/env.js";
import { redisClient } from "./config/redis.js";
import { stripe } from "./lib/stripe.js";
import { mongoAuditTrail, type AuditTrail } from "./modules/audit/service.js";
import { createPushNotifier, type NotificationService } from "./modules/notifications/service.js";
import type { PaymentGateway } from "./modules/payments/gateway.js";
import { createStripeGateway } from "./modules/payments/stripe.js";
import { createRedisQuoteStore, type QuoteStore } from "./modules/quotes/store.js";
import { createMongoStore } from "./store/mongo.js";
import type { Store } from "./store/types.js";

export type Clock = { now(): Date };

export const systemClock: Clock = { now: () => new Date() };

export interface Container {
  store: Store;
  quotes: QuoteStore;
  gateway: PaymentGateway;
  notifier: NotificationService;
  audit: AuditTrail;
  clock: Clock;
  /** Lowercase ISO currency for gateway orders */
  currency: string;
  /** Decimal, e.g. 0.18 */
  taxRate: number;
}

/** Production wiring; expects mongo to be connected already. */
export async function createContainer(): Promise<Container> {
  return {
    store: createMongoStore(),
    quotes: createRedisQuoteStore(await redisClient()),
    gateway: createStripeGateway(stripe),
    notifier: createPushNotifier(),
    audit: mongoAuditTrail,
    clock: systemClock,
    currency: env.PAYMENT_CURRENCY,
    taxRate: getTaxRate(),
  };
}
