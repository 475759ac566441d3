// src/modules/admin/service.ts
/**
 * Host moderation and the money side of the admin dashboard. Every mutation
 * leaves an audit entry; refunds themselves live in the booking lifecycle.
 */
import { logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import { NotFoundError, StateError } from "../../domain/errors.js";
import { assertRole, type Actor } from "../../middlewares/auth.js";
import type { UserRecord } from "../../store/types.js";
import { formatInstant } from "../../utils/dates.js";
import { refundDue } from "../bookings/service.js";
import { createPayoutService } from "../payouts/service.js";

export type AdminDeps = Pick<Container, "store" | "notifier" | "audit" | "clock">;

const HOST_SUMMARY_LIMIT = 10;

function fullName(user: Pick<UserRecord, "firstName" | "lastName"> | undefined): string {
  return user ? `${user.firstName} ${user.lastName}`.trim() : "N/A";
}

export function createAdminService(deps: AdminDeps) {
  const { store, notifier, audit, clock } = deps;
  const payouts = createPayoutService(deps);

  async function loadHost(userId: string) {
    const user = await store.users.findById(userId);
    if (!user || user.role !== "host") throw new NotFoundError("Host user not found.", "HOST_NOT_FOUND");
    return user;
  }

  async function listHosts(actor: Actor, filter: { isApprovedHost?: boolean } = {}) {
    assertRole(actor, "admin", "Admin access required");
    return store.users.listHosts(filter);
  }

  /**
   * Approve a host. The approval is committed first; the notification is
   * best-effort and only downgrades the response to a warning.
   */
  async function approveHost(actor: Actor, userId: string) {
    assertRole(actor, "admin", "Admin access required");
    const host = await loadHost(userId);
    if (host.isApprovedHost) {
      throw new StateError(`Host ${host.firstName} is already approved.`, undefined, "ALREADY_APPROVED");
    }
    if (!host.isActive) {
      throw new StateError(
        `Host ${host.firstName} is currently blocked. Activate the account before approval.`,
        undefined,
        "HOST_BLOCKED"
      );
    }

    const updated = await store.users.update(host.id, { isApprovedHost: true });
    if (!updated) throw new NotFoundError("Host user not found.", "HOST_NOT_FOUND");

    await audit.record({
      actorId: actor.userId,
      action: "host.approved",
      target: { kind: "user", id: host.id },
      diff: { isApprovedHost: { from: false, to: true } },
    });

    const notified = await notifier.notifyHostApproved({
      userId: host.id,
      phone: host.phone,
      name: host.firstName,
    });
    logger.info("admin.host_approved", { hostId: host.id, adminId: actor.userId, notified });

    return {
      host: updated,
      notified,
      message: notified
        ? "Host approved successfully. Notification sent."
        : "Host approved successfully. WARNING: notification failed to send.",
    };
  }

  /**
   * Block or re-activate a host. Blocking takes every vehicle of the host
   * offline in the same transaction; re-activation leaves them offline.
   */
  async function toggleHostStatus(actor: Actor, userId: string) {
    assertRole(actor, "admin", "Admin access required");
    const host = await loadHost(userId);
    const isActive = !host.isActive;

    const vehiclesDisabled = await store.transaction(async (tx) => {
      const updated = await tx.users.update(host.id, { isActive });
      if (!updated) throw new NotFoundError("Host user not found.", "HOST_NOT_FOUND");
      return isActive ? 0 : tx.vehicles.setAvailabilityForHost(host.id, false);
    });

    logger.info("admin.host_status_toggled", {
      hostId: host.id,
      adminId: actor.userId,
      isActive,
      vehiclesDisabled,
    });
    await audit.record({
      actorId: actor.userId,
      action: isActive ? "host.activated" : "host.blocked",
      target: { kind: "user", id: host.id },
      diff: { isActive: { from: host.isActive, to: isActive }, vehiclesDisabled },
    });

    return {
      isActive,
      vehiclesDisabled,
      message: isActive
        ? `Host '${host.firstName}' activated. Host must manually re-activate their vehicles.`
        : `Host '${host.firstName}' blocked. ${vehiclesDisabled} associated vehicles are now unavailable.`,
    };
  }

  async function adminDashboard(actor: Actor) {
    assertRole(actor, "admin", "Admin access required");
    const now = clock.now();

    const [totalBookings, totalVehicles, hosts, confirmed, cancelled, financials] = await Promise.all([
      store.bookings.count(),
      store.vehicles.count(),
      store.users.listHosts(),
      store.bookings.listByStatus("Confirmed"),
      store.bookings.listByStatus("Cancelled"),
      payouts.platformFinancials(),
    ]);

    const pendingRefunds = cancelled.filter((b) => b.refundStatus === "Pending");
    // completion is derived: a Confirmed booking past its end owes the deposit back
    const pendingDeposits = confirmed.filter(
      (b) => b.end < now && b.depositRefundStatus === "Pending"
    );

    const related = [...pendingRefunds, ...pendingDeposits];
    const vehicles = await store.vehicles.findManyByIds([...new Set(related.map((b) => b.vehicleId))]);
    const vehicleById = new Map(vehicles.map((v) => [v.id, v]));
    const users = await store.users.findManyByIds([
      ...new Set([...related.map((b) => b.customerId), ...vehicles.map((v) => v.hostId)]),
    ]);
    const userById = new Map(users.map((u) => [u.id, u]));

    return {
      counts: {
        totalBookings,
        confirmedBookings: confirmed.length,
        pendingRefunds: pendingRefunds.length,
        pendingDepositRefunds: pendingDeposits.length,
        totalHosts: hosts.length,
        totalVehicles,
      },
      totalRevenue: confirmed.reduce((sum, b) => sum + b.totalPrice, 0),
      pendingRefunds: pendingRefunds.map((b) => {
        const vehicle = vehicleById.get(b.vehicleId);
        return {
          bookingId: b.id,
          customerName: fullName(userById.get(b.customerId)),
          vehicleName: vehicle?.name ?? "N/A",
          hostName: vehicle ? userById.get(vehicle.hostId)?.firstName ?? "N/A" : "N/A",
          totalPrice: b.totalPrice,
          cancellationFee: b.cancellationFee ?? 0,
          refundDue: refundDue(b),
          paymentId: b.paymentId,
          bookedAt: formatInstant(b.createdAt),
        };
      }),
      pendingDepositRefunds: pendingDeposits.map((b) => ({
        bookingId: b.id,
        customerName: fullName(userById.get(b.customerId)),
        vehicleName: vehicleById.get(b.vehicleId)?.name ?? "N/A",
        depositAmount: b.depositAmount,
        end: formatInstant(b.end),
        paymentId: b.paymentId,
      })),
      pendingHosts: hosts
        .filter((h) => !h.isApprovedHost)
        .map((h) => ({ id: h.id, name: fullName(h), email: h.email, phone: h.phone, city: h.city ?? null })),
      hostBookingSummary: financials.hostPayouts
        .slice()
        .sort((a, b) => b.totalBookings - a.totalBookings)
        .slice(0, HOST_SUMMARY_LIMIT)
        .map((h) => ({ hostId: h.hostId, name: h.name, confirmedBookings: h.totalBookings })),
      financials,
    };
  }

  return { listHosts, approveHost, toggleHostStatus, adminDashboard };
}

export type AdminService = ReturnType<typeof createAdminService>;
