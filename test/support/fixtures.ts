import type { Actor } from "../../src/middlewares/auth.js";
import type { BookingRecord, UserRecord, VehicleRecord } from "../../src/store/types.js";

/**
 * Record factories for specs
 */

export function createUser(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: "user-renter",
    email: "renter@example.com",
    phone: "9000000001",
    firstName: "Asha",
    lastName: "Rao",
    role: "renter",
    city: "Pune",
    isActive: true,
    isApprovedHost: false,
    commissionTier: 70,
    createdAt: new Date("2025-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function createHost(overrides: Partial<UserRecord> = {}): UserRecord {
  return createUser({
    id: "user-host",
    email: "host@example.com",
    phone: "9000000002",
    firstName: "Vikram",
    lastName: "Shah",
    role: "host",
    isApprovedHost: true,
    ...overrides,
  });
}

export function createVehicle(overrides: Partial<VehicleRecord> = {}): VehicleRecord {
  return {
    id: "vehicle-1",
    code: "PUN-SWIFT-01",
    hostId: "user-host",
    name: "Swift",
    brand: "Maruti",
    type: "Hatchback",
    fuel: "Petrol",
    gear: "Manual",
    city: "Pune",
    location: { lat: 18.52, lng: 73.85 },
    basePricePerHour: 100,
    rating: 4.0,
    isAvailable: true,
    features: ["AC"],
    ...overrides,
  };
}

export function createBooking(overrides: Partial<BookingRecord> = {}): BookingRecord {
  return {
    id: "booking-1",
    customerId: "user-renter",
    vehicleId: "vehicle-1",
    start: new Date("2025-03-01T10:00:00Z"),
    end: new Date("2025-03-01T13:00:00Z"),
    totalPrice: 854,
    depositAmount: 500,
    status: "Confirmed",
    paymentId: "ch_test_1",
    orderId: "pi_test_1",
    refundStatus: "NotApplicable",
    depositRefundStatus: "Pending",
    cancelledAt: null,
    cancellationFee: null,
    createdAt: new Date("2025-02-20T09:00:00Z"),
    ...overrides,
  };
}

export function actorFor(user: UserRecord, sessionId = `sess-${user.id}`): Actor {
  return { userId: user.id, role: user.role, sessionId };
}

/** Mutable clock for services that take `now()` */
export function createClock(start: string | Date) {
  let current = new Date(start);
  return {
    now: () => new Date(current),
    set(next: string | Date) {
      current = new Date(next);
    },
    advanceMinutes(min: number) {
      current = new Date(current.getTime() + min * 60_000);
    },
  };
}
