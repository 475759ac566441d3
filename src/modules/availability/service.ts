import type { BookingRepository } from "../../store/types.js";
import { parseInterval } from "../../utils/dates.js";

type Instant = Date | string | null | undefined;

/**
 * True iff no Confirmed booking of the vehicle overlaps [start, end).
 * Unparseable or empty intervals are never available.
 */
export async function isAvailable(
  bookings: Pick<BookingRepository, "findOverlapping">,
  vehicleId: string,
  start: Instant,
  end: Instant
): Promise<boolean> {
  const interval = parseInterval(start, end);
  if (!interval) return false;
  const clash = await bookings.findOverlapping(vehicleId, interval.start, interval.end);
  return clash === null;
}
