import mongoose, { Schema, type Model } from "mongoose";

export type AuditTargetType = "user" | "vehicle" | "booking";

export interface AuditLogDoc extends mongoose.Document {
  actorId: mongoose.Types.ObjectId;
  action: string;
  target: { kind: AuditTargetType; id: string };
  diff?: Record<string, unknown> | null;
  at: Date;
}

const AuditLogSchema = new Schema<AuditLogDoc>(
  {
    actorId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    action: { type: String, required: true, index: true },
    target: {
      kind: { type: String, enum: ["user", "vehicle", "booking"], required: true },
      id: { type: String, required: true },
    },
    diff: { type: Schema.Types.Mixed, default: null },
    at: { type: Date, default: () => new Date(), index: true },
  },
  { versionKey: false }
);

AuditLogSchema.index({ "target.kind": 1, "target.id": 1, at: -1 });

export const AuditLog: Model<AuditLogDoc> =
  mongoose.models.AuditLog || mongoose.model<AuditLogDoc>("AuditLog", AuditLogSchema);
