/**
 * Persistence seam for the core. Services only see these records and
 * repositories; `mongo.ts` backs them with mongoose, tests with an in-memory store.
 */
import type {
  BookingStatus,
  CommissionTier,
  DepositRefundStatus,
  RefundStatus,
  Role,
} from "../domain/enums.js";

export type UserRecord = {
  id: string;
  email: string;
  phone: string;
  firstName: string;
  lastName: string;
  role: Role;
  city?: string | null;
  isActive: boolean;
  isApprovedHost: boolean;
  commissionTier: CommissionTier;
  createdAt: Date;
};

export type GeoLocation = { lat: number; lng: number };

export type VehicleRecord = {
  id: string;
  code: string;
  hostId: string;
  name: string;
  brand: string;
  type: string;
  fuel: string;
  gear: string;
  city: string;
  location: GeoLocation | null;
  basePricePerHour: number;
  rating: number;
  isAvailable: boolean;
  features: string[];
};

export type NewVehicle = Omit<VehicleRecord, "id">;

/** Listing details a host may edit; code, city and host stay fixed. */
export type VehiclePatch = Partial<
  Pick<VehicleRecord, "name" | "brand" | "type" | "fuel" | "gear" | "basePricePerHour" | "features">
>;

export type BookingRecord = {
  id: string;
  customerId: string;
  vehicleId: string;
  start: Date;
  end: Date;
  totalPrice: number;
  depositAmount: number;
  status: BookingStatus;
  paymentId: string;
  orderId: string;
  refundStatus: RefundStatus;
  depositRefundStatus: DepositRefundStatus;
  /** Set once, when the customer cancels; the fee is fixed at that moment. */
  cancelledAt: Date | null;
  cancellationFee: number | null;
  createdAt: Date;
};

export type NewBooking = Omit<BookingRecord, "id" | "createdAt">;

/** Only status and refund bookkeeping ever change after confirmation. */
export type BookingPatch = Partial<
  Pick<
    BookingRecord,
    "status" | "refundStatus" | "depositRefundStatus" | "cancelledAt" | "cancellationFee"
  >
>;

export type ReviewRecord = {
  id: string;
  bookingId: string;
  userId: string;
  vehicleId: string;
  rating: number;
  comment: string | null;
  createdAt: Date;
};

export type NewReview = Omit<ReviewRecord, "id" | "createdAt">;

export type UserPatch = Partial<Pick<UserRecord, "isActive" | "isApprovedHost" | "commissionTier">>;

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
  listHosts(filter?: { isApprovedHost?: boolean }): Promise<UserRecord[]>;
  findManyByIds(ids: string[]): Promise<UserRecord[]>;
}

export interface VehicleRepository {
  findById(id: string): Promise<VehicleRecord | null>;
  findByCode(code: string): Promise<VehicleRecord | null>;
  findManyByIds(ids: string[]): Promise<VehicleRecord[]>;
  listByHost(hostId: string): Promise<VehicleRecord[]>;
  listByCity(city: string): Promise<VehicleRecord[]>;
  listAvailable(): Promise<VehicleRecord[]>;
  create(input: NewVehicle): Promise<VehicleRecord>;
  update(id: string, patch: VehiclePatch): Promise<VehicleRecord | null>;
  count(): Promise<number>;
  setAvailability(id: string, isAvailable: boolean): Promise<VehicleRecord | null>;
  /** Returns the number of vehicles changed. */
  setAvailabilityForHost(hostId: string, isAvailable: boolean): Promise<number>;
  setRating(id: string, rating: number): Promise<void>;
  /**
   * Claim the vehicle for the rest of the current transaction. Concurrent
   * transactions claiming the same vehicle serialise (or conflict and retry).
   */
  claimForReservation(id: string): Promise<void>;
}

export interface BookingRepository {
  findById(id: string): Promise<BookingRecord | null>;
  /** First Confirmed booking of the vehicle with start < end AND end > start. */
  findOverlapping(vehicleId: string, start: Date, end: Date): Promise<BookingRecord | null>;
  create(input: NewBooking): Promise<BookingRecord>;
  update(id: string, patch: BookingPatch): Promise<BookingRecord | null>;
  listByCustomer(customerId: string): Promise<BookingRecord[]>;
  listByVehicles(vehicleIds: string[], status?: BookingStatus): Promise<BookingRecord[]>;
  listByStatus(status: BookingStatus): Promise<BookingRecord[]>;
  count(): Promise<number>;
}

export interface ReviewRepository {
  findByBooking(bookingId: string): Promise<ReviewRecord | null>;
  /** Subset of the given booking ids that already have a review. */
  reviewedBookingIds(bookingIds: string[]): Promise<Set<string>>;
  create(input: NewReview): Promise<ReviewRecord>;
  ratingsForVehicle(vehicleId: string): Promise<number[]>;
}

export interface Repositories {
  users: UserRepository;
  vehicles: VehicleRepository;
  bookings: BookingRepository;
  reviews: ReviewRepository;
}

export interface Store extends Repositories {
  /** Run `work` atomically; any throw rolls back every write made through `tx`. */
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
}
