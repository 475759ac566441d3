import { Router } from "express";
import { z } from "zod";

import type { ReservationService } from "./service.js";
import { getActor, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

// presence is checked by the service so missing fields get its 400, not a 422
const OrderBody = z.object({
  vehicleCode: z.string().trim().max(64).nullish(),
  start: z.string().trim().max(40).nullish(),
  end: z.string().trim().max(40).nullish(),
});

const ConfirmBody = z.object({
  paymentId: z.string().trim().max(255).nullish(),
  orderId: z.string().trim().max(255).nullish(),
});

export function reservationsRouter(reservations: ReservationService) {
  const router = Router();

  /** Price an interval (no order, no session state) */
  router.post(
    "/quote",
    asyncHandler(async (req, res) => {
      const body = OrderBody.parse(req.body);
      jsonOk(res, await reservations.previewQuote(body));
    })
  );

  /** Quote + open a gateway order; the quote is parked on the session */
  router.post(
    "/orders",
    requireAuth,
    asyncHandler(async (req, res) => {
      const body = OrderBody.parse(req.body);
      const order = await reservations.createOrder(getActor(req), body);
      jsonOk(res, order, 201);
    })
  );

  /** Verify the captured payment and write the booking */
  router.post(
    "/confirm",
    requireAuth,
    asyncHandler(async (req, res) => {
      const body = ConfirmBody.parse(req.body);
      const result = await reservations.confirmBooking(getActor(req), body);
      jsonOk(res, { success: true, ...result }, 201);
    })
  );

  return router;
}
