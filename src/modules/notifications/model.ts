import mongoose, { Schema, type Model } from "mongoose";

export type NotificationType =
  | "host.approved"
  | "booking.confirmed"
  | "booking.cancelled"
  | "refund.processed"
  | "deposit_refund.processed";

export const NOTIFICATION_TYPES = [
  "host.approved",
  "booking.confirmed",
  "booking.cancelled",
  "refund.processed",
  "deposit_refund.processed",
] as const satisfies readonly NotificationType[];

export type NotificationContext = {
  bookingId?: string;
  vehicleId?: string;
  vehicleName?: string;
  /** E.164 phone the host was reached on */
  contact?: string;
  amount?: number;
};

export interface NotificationDoc extends mongoose.Document {
  userId: mongoose.Types.ObjectId; // recipient
  type: NotificationType;
  actor?: { id: string; name?: string } | null;
  context?: NotificationContext | null;
  createdAt: Date;
  readAt?: Date | null;
  uniqKey?: string | null; // optional dedupe key
}

const NotificationSchema = new Schema<NotificationDoc>(
  {
    userId: { type: Schema.Types.ObjectId, ref: "User", index: true, required: true },
    type: { type: String, enum: NOTIFICATION_TYPES, required: true },
    actor: {
      id: String,
      name: String,
    },
    context: {
      bookingId: String,
      vehicleId: String,
      vehicleName: String,
      contact: String,
      amount: Number,
    },
    readAt: { type: Date, default: null },
    uniqKey: { type: String, default: null, index: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

NotificationSchema.index({ userId: 1, createdAt: -1 });
NotificationSchema.index({ userId: 1, readAt: 1 });

export const Notification: Model<NotificationDoc> =
  mongoose.models.Notification ||
  mongoose.model<NotificationDoc>("Notification", NotificationSchema);
