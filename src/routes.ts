// src/routes.ts
/** API surface: health endpoints + feature routers built from the container. */
import { Router } from "express";

import { pingMongo } from "./config/db.js";
import { pingRedis } from "./config/redis.js";
import type { Container } from "./container.js";
import { adminRouter } from "./modules/admin/routes.js";
import { createAdminService } from "./modules/admin/service.js";
import { bookingsRouter } from "./modules/bookings/routes.js";
import { createBookingService } from "./modules/bookings/service.js";
import notificationsRouter from "./modules/notifications/routes.js";
import { payoutsRouter } from "./modules/payouts/routes.js";
import { createPayoutService } from "./modules/payouts/service.js";
import { reservationsRouter } from "./modules/reservations/routes.js";
import { createReservationService } from "./modules/reservations/service.js";
import { createReviewService } from "./modules/reviews/service.js";
import { vehiclesRouter } from "./modules/vehicles/routes.js";
import { createVehicleService } from "./modules/vehicles/service.js";
import { asyncHandler, jsonOk } from "./utils/http.js";

export type HealthCheck = () => Promise<{ status: "ok" | "error"; message?: string }>;

export function createRouter(
  container: Container,
  health: { mongo: HealthCheck; redis: HealthCheck } = { mongo: pingMongo, redis: pingRedis }
) {
  const router = Router();

  const bookings = createBookingService(container);

  // Feature mounts
  router.use("/reservations", reservationsRouter(createReservationService(container)));
  router.use("/bookings", bookingsRouter(bookings, createReviewService(container)));
  router.use("/", vehiclesRouter(createVehicleService(container))); // /vehicles/inventory, /host/vehicles
  router.use("/host", payoutsRouter(createPayoutService(container)));
  router.use("/admin", adminRouter(createAdminService(container), bookings));
  router.use("/notifications", notificationsRouter);

  // Basic health (no deps)
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const uptime = process.uptime();
      const version = process.env.npm_package_version || "0.0.0";
      jsonOk(res, { status: "ok", uptime, version });
    })
  );

  // Dependencies health (actual pings)
  router.get(
    "/health/deps",
    asyncHandler(async (_req, res) => {
      const [mongo, redis] = await Promise.all([health.mongo(), health.redis()]);
      const failed = mongo.status === "error" || redis.status === "error";
      jsonOk(
        res,
        {
          mongo: mongo.status,
          redis: redis.status,
          ...(failed ? { details: { mongo: mongo.message, redis: redis.message } } : {}),
        },
        failed ? 503 : 200
      );
    })
  );

  return router;
}
