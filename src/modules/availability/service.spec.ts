import { beforeEach, describe, expect, it } from "vitest";

import { createBooking } from "../../../test/support/fixtures.js";
import { createMemoryStore, type MemoryStore } from "../../../test/support/memoryStore.js";
import { isAvailable } from "./service.js";

describe("isAvailable", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = createMemoryStore();
    // 2025-03-01 10:00-13:00 on vehicle-1
    store.seed({ bookings: [createBooking()] });
  });

  it("should refuse an overlapping interval", async () => {
    await expect(isAvailable(store.bookings, "vehicle-1", "2025-03-01 12:00", "2025-03-01 15:00")).resolves.toBe(
      false
    );
    await expect(isAvailable(store.bookings, "vehicle-1", "2025-03-01 09:00", "2025-03-01 16:00")).resolves.toBe(
      false
    );
  });

  it("should allow intervals that only touch", async () => {
    await expect(isAvailable(store.bookings, "vehicle-1", "2025-03-01 13:00", "2025-03-01 15:00")).resolves.toBe(
      true
    );
    await expect(isAvailable(store.bookings, "vehicle-1", "2025-03-01 08:00", "2025-03-01 10:00")).resolves.toBe(
      true
    );
  });

  it("should ignore cancelled bookings and other vehicles", async () => {
    store.seed({ bookings: [createBooking({ status: "Cancelled" })] });
    await expect(isAvailable(store.bookings, "vehicle-1", "2025-03-01 11:00", "2025-03-01 12:00")).resolves.toBe(
      true
    );
    store.seed({ bookings: [createBooking()] });
    await expect(isAvailable(store.bookings, "vehicle-2", "2025-03-01 11:00", "2025-03-01 12:00")).resolves.toBe(
      true
    );
  });

  it("should treat bad or empty intervals as unavailable", async () => {
    await expect(isAvailable(store.bookings, "vehicle-2", "2025-03-02 12:00", "2025-03-02 12:00")).resolves.toBe(
      false
    );
    await expect(isAvailable(store.bookings, "vehicle-2", "2025-03-02 12:00", "2025-03-02 10:00")).resolves.toBe(
      false
    );
    await expect(isAvailable(store.bookings, "vehicle-2", "soon", "2025-03-02 10:00")).resolves.toBe(false);
    await expect(isAvailable(store.bookings, "vehicle-2", "2025-02-30 10:00", "2025-03-02 10:00")).resolves.toBe(
      false
    );
  });
});
