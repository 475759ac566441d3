import { Router } from "express";

import { idParams, listHostsQuery } from "./schemas.js";
import type { AdminService } from "./service.js";
import { getActor, requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";
import type { BookingService } from "../bookings/service.js";

export function adminRouter(admin: AdminService, bookings: BookingService) {
  const router = Router();

  // all admin routes require admin role
  router.use(requireAuth, requireRole("admin"));

  router.get(
    "/dashboard",
    asyncHandler(async (req, res) => {
      jsonOk(res, await admin.adminDashboard(getActor(req)));
    })
  );

  router.get(
    "/hosts",
    asyncHandler(async (req, res) => {
      const { approved } = listHostsQuery.parse(req.query);
      const items = await admin.listHosts(
        getActor(req),
        approved === undefined ? {} : { isApprovedHost: approved === "true" }
      );
      jsonOk(res, { items });
    })
  );

  router.post(
    "/hosts/:id/approve",
    asyncHandler(async (req, res) => {
      const { id } = idParams.parse(req.params);
      const out = await admin.approveHost(getActor(req), id);
      jsonOk(res, { success: true, notified: out.notified, message: out.message });
    })
  );

  router.post(
    "/hosts/:id/toggle-status",
    asyncHandler(async (req, res) => {
      const { id } = idParams.parse(req.params);
      jsonOk(res, { success: true, ...(await admin.toggleHostStatus(getActor(req), id)) });
    })
  );

  router.post(
    "/bookings/:id/refund",
    asyncHandler(async (req, res) => {
      const { id } = idParams.parse(req.params);
      const booking = await bookings.processRefund(getActor(req), id);
      jsonOk(res, {
        success: true,
        bookingId: booking.id,
        refundStatus: booking.refundStatus,
        message: `Refund processed for booking ${booking.id}.`,
      });
    })
  );

  router.post(
    "/bookings/:id/deposit-refund",
    asyncHandler(async (req, res) => {
      const { id } = idParams.parse(req.params);
      const booking = await bookings.processDepositRefund(getActor(req), id);
      jsonOk(res, {
        success: true,
        bookingId: booking.id,
        depositRefundStatus: booking.depositRefundStatus,
        message: `Deposit refund of ${booking.depositAmount} processed for booking ${booking.id}.`,
      });
    })
  );

  return router;
}
