/** Domain enums (string unions keep JSON clean and easy to index) */

export type Role = "renter" | "host" | "admin";
export const ROLES = ["renter", "host", "admin"] as const satisfies readonly Role[];

/** Fuel drives the price adjustment; anything outside the known three prices like petrol. */
export type FuelType = "Petrol" | "Diesel" | "Electric" | (string & {});

export type BookingStatus = "Confirmed" | "Cancelled" | "Completed";
export const BOOKING_STATUSES = [
  "Confirmed",
  "Cancelled",
  "Completed",
] as const satisfies readonly BookingStatus[];

/** Refund of the rental payment after a cancellation (admin bookkeeping). */
export type RefundStatus = "NotApplicable" | "Pending" | "Processed" | "Denied";
export const REFUND_STATUSES = [
  "NotApplicable",
  "Pending",
  "Processed",
  "Denied",
] as const satisfies readonly RefundStatus[];

/** Refund of the security deposit once a rental has ended. */
export type DepositRefundStatus = "Pending" | "Processed" | "Denied" | "NotApplicable";
export const DEPOSIT_REFUND_STATUSES = [
  "Pending",
  "Processed",
  "Denied",
  "NotApplicable",
] as const satisfies readonly DepositRefundStatus[];

/** Percentage of the commissionable base paid out to the host. */
export type CommissionTier = 70 | 80;
export const COMMISSION_TIERS = [70, 80] as const satisfies readonly CommissionTier[];
export const DEFAULT_COMMISSION_TIER: CommissionTier = 70;

export function isTerminal(status: BookingStatus): boolean {
  return status === "Cancelled" || status === "Completed";
}
