/**
 * Money helpers. Prices are whole currency units (rupees) in the store and
 * minor units (paise) on the wire to the payment gateway.
 */

export type Amount = number;
export type MinorUnits = number;

/** Whole units → minor units for the gateway (1 unit = 100 minor). */
export function toMinorUnits(amount: Amount): MinorUnits {
  if (!Number.isFinite(amount)) throw new Error(`Invalid amount: ${amount}`);
  return Math.round(amount * 100);
}

/** Minor units → whole units (may be fractional). */
export function fromMinorUnits(minor: MinorUnits): Amount {
  return Math.round(minor) / 100;
}

/** Round to the nearest multiple of `step` (halves round up). */
export function roundToNearest(value: number, step: number): number {
  if (!(step > 0)) throw new Error("Invalid step");
  return Math.round(value / step) * step;
}

/** Compute a percentage of an amount, rounded to a whole unit. */
export function percentOf(amount: Amount, pct: number): Amount {
  if (!Number.isFinite(pct)) throw new Error("Invalid percentage");
  return Math.round(amount * (pct / 100));
}

/** Format whole units for display in receipts and notifications. */
export function formatCurrency(amount: Amount, currency = "INR", locale = "en-IN"): string {
  return new Intl.NumberFormat(locale, {
    style: "currency",
    currency: currency.toUpperCase(),
    currencyDisplay: "symbol",
    maximumFractionDigits: 0,
    minimumFractionDigits: 0,
  }).format(amount);
}
