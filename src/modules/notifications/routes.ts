import { Router } from "express";
import { isValidObjectId } from "mongoose";
import { z } from "zod";

import { DeviceToken } from "./deviceModel.js";
import { Notification } from "./model.js";
import { unreadCount } from "./service.js";
import { getActor, requireAuth } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

const router = Router();
router.use(requireAuth);

const RegisterBody = z.object({
  token: z.string().min(10),
  platform: z.enum(["ios", "android"]),
  apnsEnv: z.enum(["dev", "prod"]).optional(),
});

/** Register device token */
router.post(
  "/devices/register",
  asyncHandler(async (req, res) => {
    const { userId } = getActor(req);
    const { token, platform, apnsEnv } = RegisterBody.parse(req.body);

    await DeviceToken.findOneAndUpdate(
      { token },
      { $set: { userId, platform, ...(platform === "ios" ? { apnsEnv: apnsEnv ?? "dev" } : {}) } },
      { upsert: true }
    );

    jsonOk(res, { ok: true });
  })
);

/** Unregister device token (own devices only) */
router.post(
  "/devices/unregister",
  asyncHandler(async (req, res) => {
    const { userId } = getActor(req);
    const { token } = z.object({ token: z.string().min(10) }).parse(req.body);
    await DeviceToken.deleteOne({ token, userId });
    jsonOk(res, { ok: true });
  })
);

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(20),
  cursor: z.string().refine(isValidObjectId, "invalid cursor").optional(),
});

/** List notifications (cursor pagination, newest first) */
router.get(
  "/",
  asyncHandler(async (req, res) => {
    const { userId } = getActor(req);
    const { limit, cursor } = ListQuery.parse(req.query);

    const items = await Notification.find(cursor ? { userId, _id: { $lt: cursor } } : { userId })
      .sort({ _id: -1 })
      .limit(limit + 1);

    const page = items.slice(0, limit);
    const nextCursor = items.length > limit ? (page[page.length - 1]?.id ?? null) : null;

    jsonOk(res, {
      items: page.map((n) => ({
        id: n.id,
        type: n.type,
        context: n.context ?? null,
        createdAt: n.createdAt,
        readAt: n.readAt ?? null,
      })),
      nextCursor,
      unread: await unreadCount(userId),
    });
  })
);

/** Mark all read */
router.post(
  "/read-all",
  asyncHandler(async (req, res) => {
    const { userId } = getActor(req);
    await Notification.updateMany({ userId, readAt: null }, { $set: { readAt: new Date() } });
    jsonOk(res, { ok: true });
  })
);

export default router;
