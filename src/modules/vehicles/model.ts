import mongoose, { Schema, type Model } from "mongoose";

/** GeoJSON Point (WGS84). Store as [lng, lat]. */
const GeoPointSchema = new Schema(
  {
    type: { type: String, enum: ["Point"], default: "Point", required: true },
    coordinates: {
      type: [Number], // [lng, lat]
      validate: {
        validator: (v: number[]) => Array.isArray(v) && v.length === 2,
        message: "coordinates must be [lng, lat]",
      },
      required: true,
    },
  },
  { _id: false }
);

export interface VehicleDoc extends mongoose.Document {
  hostId: mongoose.Types.ObjectId;
  /** External code clients book by (unique) */
  code: string;
  name: string;
  brand: string;
  type: string;
  fuel: string;
  gear: string;
  city: string;
  subCity?: string | null;
  location?: { type: "Point"; coordinates: [number, number] } | null; // [lng, lat]

  /** Whole currency units per hour */
  basePricePerHour: number;
  rating: number;
  isAvailable: boolean;
  features: string[];
  imageUrl?: string | null;

  /** Bumped inside every confirmation transaction; see claimForReservation */
  reservationSeq: number;

  createdAt: Date;
  updatedAt: Date;
}

const VehicleSchema = new Schema<VehicleDoc>(
  {
    hostId: { type: Schema.Types.ObjectId, ref: "User", required: true, index: true },
    code: { type: String, required: true, unique: true, trim: true, maxlength: 100 },
    name: { type: String, required: true, trim: true, maxlength: 100 },
    brand: { type: String, required: true, trim: true, maxlength: 50 },
    type: { type: String, required: true, trim: true, maxlength: 20 },
    fuel: { type: String, required: true, trim: true, maxlength: 20 },
    gear: { type: String, required: true, trim: true, maxlength: 20 },
    city: { type: String, required: true, trim: true, maxlength: 50 },
    subCity: { type: String, trim: true, default: null },
    location: { type: GeoPointSchema, required: false, default: null },

    basePricePerHour: { type: Number, required: true, min: 0.01 },
    rating: { type: Number, default: 4.0, min: 0, max: 5 },
    isAvailable: { type: Boolean, default: true, index: true },
    features: { type: [String], default: [] },
    imageUrl: { type: String, default: null },

    reservationSeq: { type: Number, default: 0 },
  },
  { timestamps: true, toJSON: { virtuals: true }, toObject: { virtuals: true } }
);

VehicleSchema.index({ hostId: 1, isAvailable: 1 });
/** Geospatial search */
VehicleSchema.index({ location: "2dsphere" }, { sparse: true });

export const Vehicle: Model<VehicleDoc> =
  mongoose.models.Vehicle ||
  mongoose.model<VehicleDoc>("Vehicle", VehicleSchema);
