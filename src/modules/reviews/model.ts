import mongoose, { Schema, type Model } from "mongoose";

export interface ReviewDoc extends mongoose.Document {
  bookingId: mongoose.Types.ObjectId;
  userId: mongoose.Types.ObjectId;
  vehicleId: mongoose.Types.ObjectId;
  rating: number;
  comment?: string | null;
  createdAt: Date;
}

const ReviewSchema = new Schema<ReviewDoc>(
  {
    // unique: at most one review per booking
    bookingId: { type: Schema.Types.ObjectId, ref: "Booking", required: true, unique: true },
    userId: { type: Schema.Types.ObjectId, ref: "User", required: true },
    vehicleId: { type: Schema.Types.ObjectId, ref: "Vehicle", required: true, index: true },
    rating: { type: Number, required: true, min: 1, max: 5 },
    comment: { type: String, maxlength: 2000, default: null },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

export const Review: Model<ReviewDoc> =
  mongoose.models.Review ||
  mongoose.model<ReviewDoc>("Review", ReviewSchema);
