/**
 * Date helpers. Everything is UTC.
 * Clients send instants either as ISO strings or as "YYYY-MM-DD HH:mm[:ss]" (read as UTC).
 */

const HOUR_MS = 3_600_000;

const LOCAL_FORMAT = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2}))?$/;

function pad2(n: number) {
  return n < 10 ? `0${n}` : String(n);
}

/** Parse an instant; returns null for anything that is not a real date-time. */
export function parseInstant(input: Date | string | null | undefined): Date | null {
  if (input instanceof Date) return Number.isNaN(input.getTime()) ? null : input;
  if (typeof input !== "string") return null;
  const s = input.trim();
  if (!s) return null;

  const m = LOCAL_FORMAT.exec(s);
  if (m) {
    const [, y, mo, d, h, mi, sec] = m;
    const dt = new Date(
      Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec ?? 0))
    );
    // reject rollovers like 2025-02-30
    if (dt.getUTCMonth() !== Number(mo) - 1 || dt.getUTCDate() !== Number(d)) return null;
    return dt;
  }

  if (!/^\d{4}-\d{2}-\d{2}T/.test(s)) return null;
  const dt = new Date(s);
  return Number.isNaN(dt.getTime()) ? null : dt;
}

/** Parse a [start, end) pair; null unless both parse and end > start. */
export function parseInterval(
  start: Date | string | null | undefined,
  end: Date | string | null | undefined
): { start: Date; end: Date } | null {
  const s = parseInstant(start);
  const e = parseInstant(end);
  if (!s || !e || e.getTime() <= s.getTime()) return null;
  return { start: s, end: e };
}

/** Fractional hours from start to end (negative when end precedes start). */
export function hoursBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / HOUR_MS;
}

/** Half-open overlap: touching endpoints do not overlap. */
export function overlaps(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart < bEnd && bStart < aEnd;
}

/** "YYYY-MM-DD HH:mm" in UTC, for receipts and listings. */
export function formatInstant(d: Date): string {
  const y = d.getUTCFullYear();
  const m = pad2(d.getUTCMonth() + 1);
  const day = pad2(d.getUTCDate());
  const h = pad2(d.getUTCHours());
  const mi = pad2(d.getUTCMinutes());
  return `${y}-${m}-${day} ${h}:${mi}`;
}
