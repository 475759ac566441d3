import mongoose, { isValidObjectId, type ClientSession } from "mongoose";

import { User, type UserDoc } from "../modules/users/model.js";
import { Vehicle, type VehicleDoc } from "../modules/vehicles/model.js";
import { Booking, type BookingDoc } from "../modules/bookings/model.js";
import { Review, type ReviewDoc } from "../modules/reviews/model.js";
import type {
  BookingRecord,
  BookingRepository,
  Repositories,
  ReviewRecord,
  ReviewRepository,
  Store,
  UserRecord,
  UserRepository,
  VehicleRecord,
  VehicleRepository,
} from "./types.js";

/* -------------------------------- mappers -------------------------------- */

export function toUserRecord(doc: UserDoc): UserRecord {
  return {
    id: doc.id,
    email: doc.email,
    phone: doc.phone,
    firstName: doc.firstName,
    lastName: doc.lastName,
    role: doc.role,
    city: doc.city ?? null,
    isActive: doc.isActive,
    isApprovedHost: doc.isApprovedHost,
    commissionTier: doc.commissionTier,
    createdAt: doc.createdAt,
  };
}

export function toVehicleRecord(doc: VehicleDoc): VehicleRecord {
  const coords = doc.location?.coordinates;
  return {
    id: doc.id,
    code: doc.code,
    hostId: doc.hostId.toString(),
    name: doc.name,
    brand: doc.brand,
    type: doc.type,
    fuel: doc.fuel,
    gear: doc.gear,
    city: doc.city,
    location: coords ? { lng: coords[0], lat: coords[1] } : null,
    basePricePerHour: doc.basePricePerHour,
    rating: doc.rating,
    isAvailable: doc.isAvailable,
    features: [...doc.features],
  };
}

export function toBookingRecord(doc: BookingDoc): BookingRecord {
  return {
    id: doc.id,
    customerId: doc.customerId.toString(),
    vehicleId: doc.vehicleId.toString(),
    start: doc.start,
    end: doc.end,
    totalPrice: doc.totalPrice,
    depositAmount: doc.depositAmount,
    status: doc.status,
    paymentId: doc.paymentId,
    orderId: doc.orderId,
    refundStatus: doc.refundStatus,
    depositRefundStatus: doc.depositRefundStatus,
    cancelledAt: doc.cancelledAt ?? null,
    cancellationFee: doc.cancellationFee ?? null,
    createdAt: doc.createdAt,
  };
}

function toReviewRecord(doc: ReviewDoc): ReviewRecord {
  return {
    id: doc.id,
    bookingId: doc.bookingId.toString(),
    userId: doc.userId.toString(),
    vehicleId: doc.vehicleId.toString(),
    rating: doc.rating,
    comment: doc.comment ?? null,
    createdAt: doc.createdAt,
  };
}

/** Ids from the outside may be anything; a malformed one simply matches nothing. */
function validIds(ids: string[]): string[] {
  return ids.filter((id) => isValidObjectId(id));
}

/* ------------------------------ repositories ----------------------------- */

function userRepository(session: ClientSession | null): UserRepository {
  return {
    async findById(id) {
      if (!isValidObjectId(id)) return null;
      const doc = await User.findById(id).session(session);
      return doc ? toUserRecord(doc) : null;
    },
    async update(id, patch) {
      if (!isValidObjectId(id)) return null;
      const $set: Record<string, unknown> = { ...patch };
      if (patch.isActive === false) $set.deactivatedAt = new Date();
      if (patch.isActive === true) $set.deactivatedAt = null;
      if (patch.isApprovedHost === true) $set.approvedAt = new Date();
      const doc = await User.findByIdAndUpdate(id, { $set }, { new: true, runValidators: true }).session(
        session
      );
      return doc ? toUserRecord(doc) : null;
    },
    async listHosts(filter = {}) {
      const query: Record<string, unknown> = { role: "host" };
      if (filter.isApprovedHost !== undefined) query.isApprovedHost = filter.isApprovedHost;
      const docs = await User.find(query).sort({ createdAt: -1 }).session(session);
      return docs.map(toUserRecord);
    },
    async findManyByIds(ids) {
      const docs = await User.find({ _id: { $in: validIds(ids) } }).session(session);
      return docs.map(toUserRecord);
    },
  };
}

function vehicleRepository(session: ClientSession | null): VehicleRepository {
  return {
    async findById(id) {
      if (!isValidObjectId(id)) return null;
      const doc = await Vehicle.findById(id).session(session);
      return doc ? toVehicleRecord(doc) : null;
    },
    async findByCode(code) {
      const doc = await Vehicle.findOne({ code }).session(session);
      return doc ? toVehicleRecord(doc) : null;
    },
    async findManyByIds(ids) {
      const docs = await Vehicle.find({ _id: { $in: validIds(ids) } }).session(session);
      return docs.map(toVehicleRecord);
    },
    async listByHost(hostId) {
      if (!isValidObjectId(hostId)) return [];
      const docs = await Vehicle.find({ hostId }).sort({ createdAt: 1 }).session(session);
      return docs.map(toVehicleRecord);
    },
    async listByCity(city) {
      const docs = await Vehicle.find({ city }).session(session);
      return docs.map(toVehicleRecord);
    },
    async listAvailable() {
      const docs = await Vehicle.find({ isAvailable: true }).sort({ createdAt: 1 }).session(session);
      return docs.map(toVehicleRecord);
    },
    async create(input) {
      const { location, ...rest } = input;
      const [doc] = await Vehicle.create(
        [
          {
            ...rest,
            location: location ? { type: "Point", coordinates: [location.lng, location.lat] } : null,
          },
        ],
        { session }
      );
      if (!doc) throw new Error("vehicle insert returned nothing");
      return toVehicleRecord(doc);
    },
    async update(id, patch) {
      if (!isValidObjectId(id)) return null;
      const doc = await Vehicle.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).session(session);
      return doc ? toVehicleRecord(doc) : null;
    },
    async count() {
      return Vehicle.countDocuments({}).session(session);
    },
    async setAvailability(id, isAvailable) {
      if (!isValidObjectId(id)) return null;
      const doc = await Vehicle.findByIdAndUpdate(id, { $set: { isAvailable } }, { new: true }).session(
        session
      );
      return doc ? toVehicleRecord(doc) : null;
    },
    async setAvailabilityForHost(hostId, isAvailable) {
      if (!isValidObjectId(hostId)) return 0;
      const res = await Vehicle.updateMany({ hostId }, { $set: { isAvailable } }).session(session);
      return res.modifiedCount;
    },
    async setRating(id, rating) {
      if (!isValidObjectId(id)) return;
      await Vehicle.updateOne({ _id: id }, { $set: { rating } }).session(session);
    },
    async claimForReservation(id) {
      if (!isValidObjectId(id)) return;
      // A write on the vehicle doc inside the transaction: a second transaction
      // claiming the same vehicle hits a write conflict and is retried.
      await Vehicle.updateOne({ _id: id }, { $inc: { reservationSeq: 1 } }).session(session);
    },
  };
}

function bookingRepository(session: ClientSession | null): BookingRepository {
  return {
    async findById(id) {
      if (!isValidObjectId(id)) return null;
      const doc = await Booking.findById(id).session(session);
      return doc ? toBookingRecord(doc) : null;
    },
    async findOverlapping(vehicleId, start, end) {
      if (!isValidObjectId(vehicleId)) return null;
      const doc = await Booking.findOne({
        vehicleId,
        status: "Confirmed",
        start: { $lt: end },
        end: { $gt: start },
      }).session(session);
      return doc ? toBookingRecord(doc) : null;
    },
    async create(input) {
      const [doc] = await Booking.create([input], { session });
      if (!doc) throw new Error("booking insert returned nothing");
      return toBookingRecord(doc);
    },
    async update(id, patch) {
      if (!isValidObjectId(id)) return null;
      const doc = await Booking.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true }
      ).session(session);
      return doc ? toBookingRecord(doc) : null;
    },
    async listByCustomer(customerId) {
      if (!isValidObjectId(customerId)) return [];
      const docs = await Booking.find({ customerId }).sort({ start: -1 }).session(session);
      return docs.map(toBookingRecord);
    },
    async listByVehicles(vehicleIds, status) {
      const query: Record<string, unknown> = { vehicleId: { $in: validIds(vehicleIds) } };
      if (status) query.status = status;
      const docs = await Booking.find(query).sort({ start: 1 }).session(session);
      return docs.map(toBookingRecord);
    },
    async listByStatus(status) {
      const docs = await Booking.find({ status }).sort({ createdAt: -1 }).session(session);
      return docs.map(toBookingRecord);
    },
    async count() {
      return Booking.countDocuments({}).session(session);
    },
  };
}

function reviewRepository(session: ClientSession | null): ReviewRepository {
  return {
    async findByBooking(bookingId) {
      if (!isValidObjectId(bookingId)) return null;
      const doc = await Review.findOne({ bookingId }).session(session);
      return doc ? toReviewRecord(doc) : null;
    },
    async reviewedBookingIds(bookingIds) {
      const docs = await Review.find({ bookingId: { $in: validIds(bookingIds) } })
        .select("bookingId")
        .session(session);
      return new Set(docs.map((d) => d.bookingId.toString()));
    },
    async create(input) {
      const [doc] = await Review.create([input], { session });
      if (!doc) throw new Error("review insert returned nothing");
      return toReviewRecord(doc);
    },
    async ratingsForVehicle(vehicleId) {
      if (!isValidObjectId(vehicleId)) return [];
      const docs = await Review.find({ vehicleId }).select("rating").session(session);
      return docs.map((d) => d.rating);
    },
  };
}

export function createMongoRepositories(session: ClientSession | null = null): Repositories {
  return {
    users: userRepository(session),
    vehicles: vehicleRepository(session),
    bookings: bookingRepository(session),
    reviews: reviewRepository(session),
  };
}

/**
 * Mongo-backed store. Transactions need a replica set (see MONGO_URI);
 * `connection.transaction` retries the callback on TransientTransactionError.
 */
export function createMongoStore(connection: mongoose.Connection = mongoose.connection): Store {
  return {
    ...createMongoRepositories(),
    transaction: (work) =>
      connection.transaction((session) => work(createMongoRepositories(session))),
  };
}
