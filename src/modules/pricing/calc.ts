// src/modules/pricing/calc.ts
import { getTaxRate } from "../../config/env.js";
import type { FuelType } from "../../domain/enums.js";
import { roundToNearest, type Amount } from "../../domain/money.js";
import { hoursBetween } from "../../utils/dates.js";

/** Fuel adjustment, applied before the duration discount. */
const FUEL_FACTORS: Record<string, number> = {
  Electric: 0.95,
  Diesel: 1.05,
};

/** Hour thresholds (inclusive lower bound) → multiplier. Highest matching wins. */
const DURATION_DISCOUNTS: ReadonlyArray<{ minHours: number; factor: number }> = [
  { minHours: 96, factor: 0.85 },
  { minHours: 48, factor: 0.95 },
];

const SHORT_DEPOSIT = 500;
const DAY_DEPOSIT = 1500;
const LONG_DEPOSIT_BASE = 2000;
const LONG_DEPOSIT_RATE = 0.1;
const DEPOSIT_CAP = 5000;

export type PricedVehicle = {
  basePricePerHour: number;
  fuel: FuelType;
};

export type Quote = {
  totalHours: number;
  billedHours: number;
  subtotal: Amount;
  tax: Amount;
  deposit: Amount;
  total: Amount;
};

/** Short rentals bill whole hours; a day or longer bills the exact fraction. */
export function billedHoursFor(totalHours: number): number {
  if (totalHours <= 0) return 0;
  return totalHours < 24 ? Math.ceil(totalHours) : totalHours;
}

export function fuelFactor(fuel: FuelType): number {
  return FUEL_FACTORS[fuel] ?? 1;
}

export function durationFactor(totalHours: number): number {
  return DURATION_DISCOUNTS.find((d) => totalHours >= d.minHours)?.factor ?? 1;
}

/**
 * Rental price (pre-tax, pre-deposit) for [start, end), in whole currency units.
 * Zero or negative durations price at 0.
 */
export function priceForInterval(
  basePricePerHour: number,
  fuel: FuelType,
  start: Date,
  end: Date
): Amount {
  const totalHours = hoursBetween(start, end);
  if (totalHours <= 0) return 0;

  let subtotal = billedHoursFor(totalHours) * basePricePerHour;
  subtotal *= fuelFactor(fuel);
  subtotal *= durationFactor(totalHours);
  return Math.round(subtotal);
}

export function calculateDeposit(subtotal: Amount, totalHours: number): Amount {
  if (totalHours < 24) return SHORT_DEPOSIT;
  if (totalHours < 72) return DAY_DEPOSIT;
  const scaled = roundToNearest(LONG_DEPOSIT_BASE + LONG_DEPOSIT_RATE * subtotal, 100);
  return Math.min(scaled, DEPOSIT_CAP);
}

export function calculateTax(subtotal: Amount, rate: number = getTaxRate()): Amount {
  return Math.round(subtotal * rate);
}

/**
 * Full quote for a vehicle and interval. Pure: the reservation workflow calls it
 * once when the order is created and again when the payment is confirmed.
 */
export function quoteFor(
  vehicle: PricedVehicle,
  start: Date,
  end: Date,
  taxRate: number = getTaxRate()
): Quote {
  const totalHours = hoursBetween(start, end);
  const subtotal = priceForInterval(vehicle.basePricePerHour, vehicle.fuel, start, end);
  const tax = calculateTax(subtotal, taxRate);
  const deposit = calculateDeposit(subtotal, totalHours);
  return {
    totalHours,
    billedHours: billedHoursFor(totalHours),
    subtotal,
    tax,
    deposit,
    total: subtotal + tax + deposit,
  };
}

export type ReceiptBreakdown = {
  billedHours: number;
  durationLabel: string;
  subtotal: Amount;
  tax: Amount;
  deposit: Amount;
  total: Amount;
};

/**
 * Rebuild the receipt lines from a stored booking. Only total and deposit are
 * persisted, so subtotal and tax are split back out of (total - deposit).
 */
export function breakdownFromBooking(
  booking: { start: Date; end: Date; totalPrice: Amount; depositAmount: Amount },
  taxRate: number = getTaxRate()
): ReceiptBreakdown {
  const billedHours = billedHoursFor(hoursBetween(booking.start, booking.end));
  const taxable = booking.totalPrice - booking.depositAmount;
  const subtotal = Math.round(taxable / (1 + taxRate));
  return {
    billedHours: Math.round(billedHours * 10) / 10,
    durationLabel: `${billedHours.toFixed(1)} Hours`,
    subtotal,
    tax: taxable - subtotal,
    deposit: booking.depositAmount,
    total: booking.totalPrice,
  };
}
