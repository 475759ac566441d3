// src/modules/quotes/store.ts
/** Pending reservation quotes, one per login session, consumed once at confirmation. */
import { z } from "zod";

import { env } from "../../config/env.js";
import { errorMessage, logger } from "../../config/logger.js";
import { key } from "../../config/redis.js";

export type PendingQuote = {
  customerId: string;
  vehicleId: string;
  vehicleCode: string;
  start: Date;
  end: Date;
  orderId: string;
  expectedTotal: number;
  expectedDeposit: number;
  createdAt: Date;
};

export interface QuoteStore {
  /** Store (or supersede) the session's quote. */
  put(sessionId: string, quote: PendingQuote): Promise<void>;
  get(sessionId: string): Promise<PendingQuote | null>;
  /** Atomic get-and-delete; a quote owned by someone else reads as absent. */
  pop(sessionId: string, ownerId: string): Promise<PendingQuote | null>;
}

/** The slice of the redis client the quote store needs. */
export interface QuoteKv {
  set(key: string, value: string, opts: { EX: number }): Promise<unknown>;
  get(key: string): Promise<string | null>;
  getDel(key: string): Promise<string | null>;
}

const StoredQuoteSchema = z.object({
  customerId: z.string(),
  vehicleId: z.string(),
  vehicleCode: z.string(),
  start: z.coerce.date(),
  end: z.coerce.date(),
  orderId: z.string(),
  expectedTotal: z.number(),
  expectedDeposit: z.number(),
  createdAt: z.coerce.date(),
});

export function quoteKey(sessionId: string) {
  return key("quote", sessionId);
}

function decode(raw: string | null, sessionId: string): PendingQuote | null {
  if (!raw) return null;
  try {
    const parsed = StoredQuoteSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    logger.warn("quotes.decode_failed", { sessionId, issues: parsed.error.issues.length });
  } catch (err) {
    logger.warn("quotes.decode_failed", { sessionId, err: errorMessage(err) });
  }
  return null;
}

export function createRedisQuoteStore(
  client: QuoteKv,
  ttlSecs: number = env.QUOTE_TTL_SECS
): QuoteStore {
  return {
    async put(sessionId, quote) {
      await client.set(quoteKey(sessionId), JSON.stringify(quote), { EX: ttlSecs });
    },
    async get(sessionId) {
      return decode(await client.get(quoteKey(sessionId)), sessionId);
    },
    async pop(sessionId, ownerId) {
      const quote = decode(await client.getDel(quoteKey(sessionId)), sessionId);
      if (quote && quote.customerId !== ownerId) {
        logger.warn("quotes.owner_mismatch", { sessionId, ownerId, orderId: quote.orderId });
        return null;
      }
      return quote;
    },
  };
}
