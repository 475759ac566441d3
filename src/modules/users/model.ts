import mongoose, { Schema, type Model } from "mongoose";

import {
  COMMISSION_TIERS,
  DEFAULT_COMMISSION_TIER,
  ROLES,
  type CommissionTier,
  type Role,
} from "../../domain/enums.js";

export type { Role };

export interface UserDoc extends mongoose.Document {
  email: string;
  phone: string;
  firstName: string;
  lastName: string;
  role: Role;
  city?: string | null;

  /** Account flags (admin-owned) */
  isActive: boolean;
  deactivatedAt: Date | null;
  isApprovedHost: boolean;
  approvedAt?: Date | null;

  /** Host-owned payout tier */
  commissionTier: CommissionTier;

  /** Timestamps (from { timestamps: true }) */
  createdAt: Date;
  updatedAt: Date;

  /** Virtuals */
  fullName: string;
}

const UserSchema = new Schema<UserDoc>(
  {
    email: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
      match: [/.+@.+\..+/, "Must use a valid email address"],
    },
    phone: { type: String, required: true, unique: true, trim: true, maxlength: 15 },
    firstName: { type: String, required: true, trim: true, maxlength: 80 },
    lastName: { type: String, required: true, trim: true, maxlength: 80 },
    role: { type: String, enum: ROLES, default: "renter" },
    city: { type: String, trim: true, default: null },

    isActive: { type: Boolean, default: true },
    deactivatedAt: { type: Date, default: null },
    isApprovedHost: { type: Boolean, default: false },
    approvedAt: { type: Date, default: null },

    commissionTier: {
      type: Number,
      enum: COMMISSION_TIERS,
      default: DEFAULT_COMMISSION_TIER,
    },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

/** Virtual full name */
UserSchema.virtual("fullName").get(function (this: UserDoc) {
  return `${this.firstName} ${this.lastName}`.trim();
});

/** Indexes */
UserSchema.index({ role: 1, isApprovedHost: 1 });

export const User: Model<UserDoc> =
  mongoose.models.User || mongoose.model<UserDoc>("User", UserSchema);
