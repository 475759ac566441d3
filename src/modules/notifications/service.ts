import apn from "@parse/node-apn";
import { cert, getApps, initializeApp } from "firebase-admin/app";
import { getMessaging } from "firebase-admin/messaging";
import { Types } from "mongoose";

import { DeviceToken } from "./deviceModel.js";
import {
  Notification,
  type NotificationContext,
  type NotificationDoc,
  type NotificationType,
} from "./model.js";
import { env, pushConfig } from "../../config/env.js";
import { errorMessage, logger } from "../../config/logger.js";

export type BookingEventType = Exclude<NotificationType, "host.approved">;

/** Outbound notifications. Best-effort: false means "not delivered", never a throw. */
export interface NotificationService {
  notifyHostApproved(host: { userId: string; phone: string; name: string }): Promise<boolean>;
  notifyBookingEvent(input: {
    userId: string;
    type: BookingEventType;
    bookingId: string;
    vehicleName?: string;
    amount?: number;
  }): Promise<boolean>;
}

/** Prefix the default country code onto local numbers. */
export function normalizePhone(phone: string, countryCode: string = env.DEFAULT_COUNTRY_CODE): string {
  const trimmed = phone.trim().replace(/[\s-]/g, "");
  if (trimmed.startsWith("+")) return trimmed;
  return `${countryCode}${trimmed.replace(/^0+/, "")}`;
}

let fcmReady = false;
let apnsProvider: apn.Provider | null = null;

function initFCM() {
  if (fcmReady) return;
  const { projectId, clientEmail, privateKey } = pushConfig.fcm;
  if (!projectId || !clientEmail || !privateKey) return;

  if (!getApps().length) {
    initializeApp({ credential: cert({ projectId, clientEmail, privateKey }) });
  }
  fcmReady = true;
  logger.info("notifications.fcm_initialized");
}

function initAPNs() {
  if (apnsProvider) return;
  const { teamId, keyId, p8, bundleId } = pushConfig.apns;
  if (!teamId || !keyId || !p8 || !bundleId) return;

  apnsProvider = new apn.Provider({
    token: { key: p8, keyId, teamId },
    production: pushConfig.apns.env === "prod",
  });
  logger.info("notifications.apns_initialized", { env: pushConfig.apns.env });
}

const TITLES: Record<NotificationType, string> = {
  "host.approved": "You're approved to host",
  "booking.confirmed": "Booking confirmed",
  "booking.cancelled": "Booking cancelled",
  "refund.processed": "Refund processed",
  "deposit_refund.processed": "Deposit refunded",
};

function bodyFor(type: NotificationType, name: string | undefined, ctx: NotificationContext) {
  switch (type) {
    case "host.approved":
      return `Congrats${name ? `, ${name}` : ""}! Your host application is approved. Log in to list your vehicles.`;
    case "booking.confirmed":
      return ctx.vehicleName ? `Your ${ctx.vehicleName} is booked.` : "Your booking is confirmed.";
    case "booking.cancelled":
      return ctx.amount !== undefined
        ? `Refund of ${ctx.amount} is pending review.`
        : "Your booking was cancelled.";
    case "refund.processed":
    case "deposit_refund.processed":
      return ctx.amount !== undefined ? `${ctx.amount} is on its way back to you.` : TITLES[type];
  }
}

type NotifyInput = {
  userId: string;
  type: NotificationType;
  actor?: { id: string; name?: string };
  context?: NotificationContext;
  uniqKey?: string;
};

/** Persist + push to all devices (push is best-effort). */
export async function notify(input: NotifyInput): Promise<NotificationDoc> {
  const userId = new Types.ObjectId(input.userId);
  const context = input.context ?? {};

  // 1) Persist (deduped when a key is given)
  const doc = input.uniqKey
    ? await Notification.findOneAndUpdate(
        { uniqKey: input.uniqKey },
        {
          $setOnInsert: {
            userId,
            type: input.type,
            actor: input.actor ?? null,
            context,
            uniqKey: input.uniqKey,
          },
        },
        { new: true, upsert: true }
      )
    : await Notification.create({
        userId,
        type: input.type,
        actor: input.actor ?? null,
        context,
        uniqKey: null,
      });
  if (!doc) throw new Error("notification upsert returned nothing");

  // 2) Devices
  const tokens = await DeviceToken.find({ userId }).lean();
  if (!tokens.length) {
    logger.info("notifications.no_devices", { userId: input.userId, type: input.type });
    return doc;
  }

  initFCM();
  initAPNs();

  const unread = await Notification.countDocuments({ userId, readAt: null });
  const title = TITLES[input.type];
  const body = bodyFor(input.type, input.actor?.name, context);
  const data: Record<string, string> = {
    type: input.type,
    ...(context.bookingId ? { bookingId: context.bookingId } : {}),
    ...(context.vehicleId ? { vehicleId: context.vehicleId } : {}),
  };

  // FCM (android)
  const fcmTokens = tokens.filter((t) => t.platform === "android").map((t) => t.token);
  if (fcmTokens.length) {
    if (fcmReady) {
      try {
        await getMessaging().sendEachForMulticast({
          tokens: fcmTokens,
          notification: { title, body },
          data,
          android: { notification: { sound: "default" } },
        });
      } catch (e) {
        logger.warn("notifications.fcm_error", { error: errorMessage(e) });
      }
    } else {
      logger.info("notifications.fcm_skipped_not_configured", { count: fcmTokens.length });
    }
  }

  // APNs (ios)
  const iosTokens = tokens.filter((t) => t.platform === "ios").map((t) => t.token);
  if (iosTokens.length) {
    const provider = apnsProvider;
    if (provider) {
      const note = new apn.Notification();
      note.topic = pushConfig.apns.bundleId;
      note.alert = { title, body };
      note.sound = "default";
      note.badge = unread;
      note.payload = data;

      const results = await Promise.allSettled(iosTokens.map((tok) => provider.send(note, tok)));
      const failed = results.filter((r) => r.status === "rejected").length;
      if (failed) logger.warn("notifications.apns_error", { failed, total: iosTokens.length });
    } else {
      logger.info("notifications.apns_skipped_not_configured", { count: iosTokens.length });
    }
  }

  return doc;
}

export async function unreadCount(userId: string) {
  return Notification.countDocuments({ userId: new Types.ObjectId(userId), readAt: null });
}

/** In-app + push notifier backed by mongo and the configured push providers. */
export function createPushNotifier(): NotificationService {
  return {
    async notifyHostApproved({ userId, phone, name }) {
      const contact = normalizePhone(phone);
      try {
        await notify({
          userId,
          type: "host.approved",
          actor: { id: userId, name },
          context: { contact },
          uniqKey: `host.approved:${userId}`,
        });
        logger.info("notifications.host_approved", { userId, contact });
        return true;
      } catch (err) {
        logger.warn("notifications.host_approved_failed", { userId, err: errorMessage(err) });
        return false;
      }
    },

    async notifyBookingEvent({ userId, type, bookingId, vehicleName, amount }) {
      try {
        await notify({
          userId,
          type,
          context: { bookingId, vehicleName, amount },
          uniqKey: `${type}:${bookingId}`,
        });
        return true;
      } catch (err) {
        logger.warn("notifications.booking_event_failed", {
          userId,
          type,
          bookingId,
          err: errorMessage(err),
        });
        return false;
      }
    },
  };
}
