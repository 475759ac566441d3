// zod schemas for host vehicle endpoints
import { z } from "zod";

const text = (max: number) => z.string().trim().min(1).max(max);

export const createVehicleBody = z.object({
  name: text(100),
  brand: text(50),
  type: text(20),
  fuel: text(20),
  gear: text(20),
  city: text(50),
  basePricePerHour: z.coerce.number().positive(),
  features: z.array(text(40)).max(30).default([]),
  location: z
    .object({
      lat: z.number().min(-90).max(90),
      lng: z.number().min(-180).max(180),
    })
    .nullish(),
});

export const updateVehicleBody = createVehicleBody
  .pick({ name: true, brand: true, type: true, fuel: true, gear: true, basePricePerHour: true })
  .extend({ features: z.array(text(40)).max(30) })
  .partial()
  .refine((v) => Object.keys(v).length > 0, { message: "Nothing to update" });

export const vehicleParams = z.object({
  id: z.string().trim().min(1).max(64),
});
