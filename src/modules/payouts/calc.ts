// src/modules/payouts/calc.ts
import { DEFAULT_COMMISSION_TIER, type CommissionTier } from "../../domain/enums.js";
import type { Amount } from "../../domain/money.js";

export type CommissionSplit = {
  /** total - deposit; the deposit is never shared */
  base: Amount;
  hostShare: Amount;
  platformCommission: Amount;
};

export function commissionSplit(
  totalPrice: Amount,
  depositAmount: Amount,
  tier: CommissionTier = DEFAULT_COMMISSION_TIER
): CommissionSplit {
  const base = totalPrice - depositAmount;
  const hostShare = Math.round((base * tier) / 100);
  return { base, hostShare, platformCommission: base - hostShare };
}
