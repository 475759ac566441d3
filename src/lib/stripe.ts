import Stripe from "stripe";

import { env } from "../config/env.js";

export const stripe = new Stripe(env.STRIPE_SECRET_KEY, {
  timeout: env.PAYMENT_TIMEOUT_MS,
  maxNetworkRetries: 1,
});
