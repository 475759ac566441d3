import mongoose, { Schema, type Model } from "mongoose";

import {
  BOOKING_STATUSES,
  DEPOSIT_REFUND_STATUSES,
  REFUND_STATUSES,
  type BookingStatus,
  type DepositRefundStatus,
  type RefundStatus,
} from "../../domain/enums.js";

export interface BookingDoc extends mongoose.Document {
  customerId: mongoose.Types.ObjectId;
  vehicleId: mongoose.Types.ObjectId;

  /** Half-open [start, end) */
  start: Date;
  end: Date;

  /** Whole currency units, fixed at confirmation */
  totalPrice: number;
  depositAmount: number;

  status: BookingStatus;

  /** Gateway references (payment = captured charge, order = payment intent) */
  paymentId: string;
  orderId: string;

  refundStatus: RefundStatus;
  depositRefundStatus: DepositRefundStatus;
  cancelledAt: Date | null;
  cancellationFee: number | null;

  createdAt: Date;
  updatedAt: Date;
}

const BookingSchema = new Schema<BookingDoc>(
  {
    customerId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    vehicleId: { type: Schema.Types.ObjectId, ref: "Vehicle", required: true },

    start: { type: Date, required: true },
    end: { type: Date, required: true },

    totalPrice: { type: Number, required: true, min: 0, immutable: true },
    depositAmount: { type: Number, required: true, min: 0, immutable: true },

    status: { type: String, enum: BOOKING_STATUSES, default: "Confirmed", index: true },

    paymentId: { type: String, required: true },
    orderId: { type: String, required: true },

    refundStatus: { type: String, enum: REFUND_STATUSES, default: "NotApplicable" },
    depositRefundStatus: { type: String, enum: DEPOSIT_REFUND_STATUSES, default: "Pending" },
    cancelledAt: { type: Date, default: null },
    cancellationFee: { type: Number, default: null, min: 0 },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

/** Basic time validation */
BookingSchema.pre("validate", function (next) {
  if (this.start >= this.end) {
    return next(new Error("end must be after start"));
  }
  next();
});

// Overlap probes: vehicle + status + start range
BookingSchema.index({ vehicleId: 1, status: 1, start: 1, end: 1 });
// "My bookings"
BookingSchema.index({ customerId: 1, start: -1 });
// Admin refund queues
BookingSchema.index({ status: 1, refundStatus: 1 });
// One payment never produces two bookings
BookingSchema.index({ paymentId: 1 }, { unique: true });

export const Booking: Model<BookingDoc> =
  mongoose.models.Booking ||
  mongoose.model<BookingDoc>("Booking", BookingSchema);
