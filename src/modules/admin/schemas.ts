// zod schemas for admin endpoints
import { z } from "zod";

export const listHostsQuery = z.object({
  approved: z.enum(["true", "false"]).optional(),
});

export const idParams = z.object({
  id: z.string().trim().min(1).max(64),
});
