import { Router } from "express";
import { z } from "zod";

import type { PayoutService } from "./service.js";
import { getActor, requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

const TierBody = z.object({ tier: z.coerce.number().int() });

/** Host earnings + commission tier (mounted under /host) */
export function payoutsRouter(payouts: PayoutService) {
  const router = Router();
  router.use(requireAuth, requireRole("host"));

  router.get(
    "/tier",
    asyncHandler(async (req, res) => {
      jsonOk(res, await payouts.getTierOptions(getActor(req)));
    })
  );

  router.put(
    "/tier",
    asyncHandler(async (req, res) => {
      const { tier } = TierBody.parse(req.body);
      const out = await payouts.setCommissionTier(getActor(req), tier);
      jsonOk(res, { success: true, ...out });
    })
  );

  router.get(
    "/earnings",
    asyncHandler(async (req, res) => {
      jsonOk(res, await payouts.hostEarnings(getActor(req)));
    })
  );

  return router;
}
