// src/modules/vehicles/service.ts
import { logger } from "../../config/logger.js";
import type { Container } from "../../container.js";
import { NotFoundError, StateError, ValidationError } from "../../domain/errors.js";
import type { Actor } from "../../middlewares/auth.js";
import type {
  BookingRecord,
  GeoLocation,
  Repositories,
  VehiclePatch,
  VehicleRecord,
} from "../../store/types.js";
import { formatInstant } from "../../utils/dates.js";
import { requireActiveHost } from "../users/service.js";

export type InventoryItem = Omit<VehicleRecord, "hostId" | "isAvailable"> & {
  /** Confirmed [start, end] pairs, "YYYY-MM-DD HH:mm" */
  booked: Array<[string, string]>;
};

export type NewVehicleInput = {
  name: string;
  brand: string;
  type: string;
  fuel: string;
  gear: string;
  city: string;
  basePricePerHour: number;
  features?: string[];
  location?: GeoLocation | null;
};

export type DemandInsights = {
  advice: string;
  action: "red" | "green";
  mostDemandedType: string | null;
  totalBookings: number;
  typeData: Array<{ type: string; count: number }>;
};

/** Look-back window for demand insights. */
export const DEMAND_WINDOW_DAYS = 30;
export const DEMAND_MIN_BOOKINGS = 10;

/** `swift-dzire-pune-<hostId>-3`: the host's nth listing of that name in that city. */
export function vehicleCode(name: string, city: string, hostId: string, n: number): string {
  return `${name.trim().toLowerCase().replace(/ /g, "-")}-${city.trim().toLowerCase()}-${hostId}-${n}`;
}

function assertPrice(price: number | undefined) {
  if (price !== undefined && !(Number.isFinite(price) && price > 0)) {
    throw new ValidationError("Base price must be a positive number.", { basePricePerHour: price });
  }
}

/** First Confirmed booking on the vehicle that has not ended yet. */
async function upcomingBooking(
  repos: Repositories,
  vehicleId: string,
  now: Date
): Promise<BookingRecord | undefined> {
  const confirmed = await repos.bookings.listByVehicles([vehicleId], "Confirmed");
  return confirmed.find((b) => b.end > now);
}

export function createVehicleService(deps: Pick<Container, "store" | "clock">) {
  const { store, clock } = deps;

  async function ownVehicle(repos: Repositories, actor: Actor, vehicleId: string) {
    const vehicle = await repos.vehicles.findById(vehicleId);
    if (!vehicle || vehicle.hostId !== actor.userId) {
      throw new NotFoundError(
        "Vehicle not found or you don't have permission to edit it.",
        "VEHICLE_NOT_FOUND"
      );
    }
    return vehicle;
  }

  /** Bookable vehicles with the intervals already taken on each. */
  async function listInventory(): Promise<InventoryItem[]> {
    const vehicles = await store.vehicles.listAvailable();
    const bookings = await store.bookings.listByVehicles(
      vehicles.map((v) => v.id),
      "Confirmed"
    );

    const booked = new Map<string, Array<[string, string]>>();
    for (const b of bookings) {
      const list = booked.get(b.vehicleId) ?? [];
      list.push([formatInstant(b.start), formatInstant(b.end)]);
      booked.set(b.vehicleId, list);
    }

    return vehicles.map((v) => ({
      id: v.id,
      code: v.code,
      name: v.name,
      brand: v.brand,
      type: v.type,
      fuel: v.fuel,
      gear: v.gear,
      city: v.city,
      location: v.location,
      basePricePerHour: v.basePricePerHour,
      rating: v.rating,
      features: v.features,
      booked: booked.get(v.id) ?? [],
    }));
  }

  /** The host's listings; `hasFutureBooking` marks the ones that cannot be edited right now. */
  async function listHostVehicles(actor: Actor) {
    const host = await requireActiveHost(store.users, actor);
    const vehicles = await store.vehicles.listByHost(host.id);
    const confirmed = await store.bookings.listByVehicles(
      vehicles.map((v) => v.id),
      "Confirmed"
    );
    const now = clock.now();
    const busy = new Set(confirmed.filter((b) => b.end > now).map((b) => b.vehicleId));

    return vehicles.map((v) => ({ ...v, hasFutureBooking: busy.has(v.id) }));
  }

  async function createVehicle(actor: Actor, input: NewVehicleInput) {
    const host = await requireActiveHost(store.users, actor);
    assertPrice(input.basePricePerHour);

    const vehicle = await store.transaction(async (tx) => {
      const listed = await tx.vehicles.listByHost(host.id);
      return tx.vehicles.create({
        code: vehicleCode(input.name, input.city, host.id, listed.length + 1),
        hostId: host.id,
        name: input.name.trim(),
        brand: input.brand.trim(),
        type: input.type.trim(),
        fuel: input.fuel.trim(),
        gear: input.gear.trim(),
        city: input.city.trim(),
        location: input.location ?? null,
        basePricePerHour: input.basePricePerHour,
        rating: 4.0,
        isAvailable: true,
        features: input.features ?? [],
      });
    });

    logger.info("vehicles.created", { vehicleId: vehicle.id, code: vehicle.code, hostId: host.id });
    return vehicle;
  }

  /** Edit listing details. Refused while a Confirmed booking has yet to end, so its price stays put. */
  async function updateVehicle(actor: Actor, vehicleId: string, patch: VehiclePatch) {
    const host = await requireActiveHost(store.users, actor);
    assertPrice(patch.basePricePerHour);

    const updated = await store.transaction(async (tx) => {
      const vehicle = await ownVehicle(tx, actor, vehicleId);
      await tx.vehicles.claimForReservation(vehicle.id);

      if (await upcomingBooking(tx, vehicle.id, clock.now())) {
        throw new StateError(`Cannot edit '${vehicle.name}' as it has an upcoming booking.`, {
          vehicleId: vehicle.id,
        });
      }
      const next = await tx.vehicles.update(vehicle.id, patch);
      if (!next) throw new NotFoundError("Vehicle not found", "VEHICLE_NOT_FOUND");
      return next;
    });

    logger.info("vehicles.updated", {
      vehicleId: updated.id,
      hostId: host.id,
      fields: Object.keys(patch),
    });
    return updated;
  }

  /**
   * Flip a vehicle's bookable flag. Taking it offline is refused while a
   * Confirmed booking still has to run.
   */
  async function toggleVehicleAvailability(actor: Actor, vehicleId: string) {
    const host = await requireActiveHost(store.users, actor);

    const updated = await store.transaction(async (tx) => {
      const vehicle = await ownVehicle(tx, actor, vehicleId);
      // serialises with confirmBooking on the same vehicle
      await tx.vehicles.claimForReservation(vehicle.id);

      if (vehicle.isAvailable) {
        const upcoming = await upcomingBooking(tx, vehicle.id, clock.now());
        if (upcoming) {
          throw new StateError(
            `Cannot make '${vehicle.name}' unavailable. It has a confirmed future booking ending on ${formatInstant(upcoming.end)}.`,
            { bookingId: upcoming.id }
          );
        }
      }

      const next = await tx.vehicles.setAvailability(vehicle.id, !vehicle.isAvailable);
      if (!next) throw new NotFoundError("Vehicle not found", "VEHICLE_NOT_FOUND");
      return next;
    });

    logger.info("vehicles.availability_toggled", {
      vehicleId: updated.id,
      hostId: host.id,
      isAvailable: updated.isAvailable,
    });
    return updated;
  }

  /** Recent Confirmed demand in the host's city, by vehicle type, with a pricing hint. */
  async function demandInsights(actor: Actor): Promise<DemandInsights> {
    const host = await requireActiveHost(store.users, actor);
    const since = new Date(clock.now().getTime() - DEMAND_WINDOW_DAYS * 24 * 60 * 60 * 1000);

    const vehicles = host.city ? await store.vehicles.listByCity(host.city) : [];
    const typeOf = new Map(vehicles.map((v) => [v.id, v.type]));
    const recent = (
      await store.bookings.listByVehicles(
        vehicles.map((v) => v.id),
        "Confirmed"
      )
    ).filter((b) => b.createdAt >= since);

    const total = recent.length;
    if (total < DEMAND_MIN_BOOKINGS) {
      return {
        advice: "Gathering Data: More booking data needed for accurate insights.",
        action: "green",
        mostDemandedType: null,
        totalBookings: total,
        typeData: [],
      };
    }

    const counts = new Map<string, number>();
    for (const b of recent) {
      const type = typeOf.get(b.vehicleId) ?? "Unknown";
      counts.set(type, (counts.get(type) ?? 0) + 1);
    }
    const typeData = [...counts].map(([type, count]) => ({ type, count })).sort((a, b) => b.count - a.count);
    const top = typeData[0];
    const surge = top !== undefined && total > 50 && top.count / total > 0.4;

    return {
      advice: surge
        ? "Consider a 5-10% price increase on high-demand vehicle types."
        : "Maintain current competitive prices. Market demand is balanced.",
      action: surge ? "red" : "green",
      mostDemandedType: top?.type ?? null,
      totalBookings: total,
      typeData,
    };
  }

  return {
    listInventory,
    listHostVehicles,
    createVehicle,
    updateVehicle,
    toggleVehicleAvailability,
    demandInsights,
  };
}

export type VehicleService = ReturnType<typeof createVehicleService>;
