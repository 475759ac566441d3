// src/modules/payouts/service.ts
import { logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import { COMMISSION_TIERS, type CommissionTier } from "../../domain/enums.js";
import { ForbiddenError, NotFoundError, ValidationError } from "../../domain/errors.js";
import type { Actor } from "../../middlewares/auth.js";
import type { UserRecord } from "../../store/types.js";
import { formatInstant } from "../../utils/dates.js";
import { requireActiveHost } from "../users/service.js";
import { commissionSplit } from "./calc.js";

export type PayoutDeps = Pick<Container, "store" | "audit">;

function isCommissionTier(value: number): value is CommissionTier {
  return COMMISSION_TIERS.some((t) => t === value);
}

export function createPayoutService(deps: PayoutDeps) {
  const { store, audit } = deps;

  const loadHost = (actor: Actor) => requireActiveHost(store.users, actor);

  /** Tier 80 is earned: approved, active and at least one listed vehicle. */
  async function tierEligibility(host: UserRecord) {
    const vehicles = await store.vehicles.listByHost(host.id);
    return {
      currentTier: host.commissionTier,
      canUsePremiumTier: host.isApprovedHost && host.isActive && vehicles.length >= 1,
    };
  }

  async function getTierOptions(actor: Actor) {
    const host = await loadHost(actor);
    return { tiers: COMMISSION_TIERS, ...(await tierEligibility(host)) };
  }

  async function setCommissionTier(actor: Actor, tier: number) {
    if (!isCommissionTier(tier)) {
      throw new ValidationError("Invalid tier selection.", { tier, allowed: COMMISSION_TIERS });
    }
    const host = await loadHost(actor);
    if (tier === 80 && !(await tierEligibility(host)).canUsePremiumTier) {
      throw new ForbiddenError(
        "You do not meet the minimum vehicle/availability requirements for the 80% tier yet.",
        "TIER_NOT_ELIGIBLE"
      );
    }

    const updated = await store.users.update(host.id, { commissionTier: tier });
    if (!updated) throw new NotFoundError("Host not found", "USER_NOT_FOUND");

    logger.info("payouts.tier_changed", { hostId: host.id, from: host.commissionTier, to: tier });
    await audit.record({
      actorId: actor.userId,
      action: "host.commission_tier_changed",
      target: { kind: "user", id: host.id },
      diff: { commissionTier: { from: host.commissionTier, to: tier } },
    });
    return { commissionTier: updated.commissionTier };
  }

  /** Confirmed bookings on the host's vehicles, newest first, with the split at the current tier. */
  async function hostEarnings(actor: Actor) {
    const host = await loadHost(actor);
    const vehicles = await store.vehicles.listByHost(host.id);
    const names = new Map(vehicles.map((v) => [v.id, v.name]));
    const bookings = await store.bookings.listByVehicles(
      vehicles.map((v) => v.id),
      "Confirmed"
    );

    const rows = bookings
      .slice()
      .sort((a, b) => b.start.getTime() - a.start.getTime())
      .map((b) => {
        const split = commissionSplit(b.totalPrice, b.depositAmount, host.commissionTier);
        return {
          bookingId: b.id,
          vehicleName: names.get(b.vehicleId) ?? null,
          totalPrice: b.totalPrice,
          depositAmount: b.depositAmount,
          hostShare: split.hostShare,
          platformCommission: split.platformCommission,
          start: formatInstant(b.start),
        };
      });

    return {
      payoutRate: host.commissionTier,
      totalLifetimeEarnings: rows.reduce((sum, r) => sum + r.hostShare, 0),
      bookings: rows,
    };
  }

  /** Platform commission and host payouts due over every Confirmed booking. */
  async function platformFinancials() {
    const bookings = await store.bookings.listByStatus("Confirmed");
    const vehicles = await store.vehicles.findManyByIds([...new Set(bookings.map((b) => b.vehicleId))]);
    const hostOf = new Map(vehicles.map((v) => [v.id, v.hostId]));
    const hosts = await store.users.findManyByIds([...new Set(vehicles.map((v) => v.hostId))]);
    const hostById = new Map(hosts.map((h) => [h.id, h]));

    let totalPlatformCommission = 0;
    let totalPayoutDue = 0;
    const perHost = new Map<
      string,
      { hostId: string; name: string; tier: CommissionTier; totalEarnings: number; totalBookings: number }
    >();

    for (const b of bookings) {
      const hostId = hostOf.get(b.vehicleId);
      const host = hostId ? hostById.get(hostId) : undefined;
      const split = commissionSplit(b.totalPrice, b.depositAmount, host?.commissionTier);
      totalPlatformCommission += split.platformCommission;
      totalPayoutDue += split.hostShare;
      if (!host) continue;

      const row = perHost.get(host.id) ?? {
        hostId: host.id,
        name: host.firstName,
        tier: host.commissionTier,
        totalEarnings: 0,
        totalBookings: 0,
      };
      row.totalEarnings += split.hostShare;
      row.totalBookings += 1;
      perHost.set(host.id, row);
    }

    return {
      totalPlatformCommission,
      totalPayoutDue,
      hostPayouts: [...perHost.values()].sort((a, b) => b.totalEarnings - a.totalEarnings),
    };
  }

  return { getTierOptions, setCommissionTier, hostEarnings, platformFinancials };
}

export type PayoutService = ReturnType<typeof createPayoutService>;
