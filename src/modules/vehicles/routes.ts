import { Router } from "express";

import { createVehicleBody, updateVehicleBody, vehicleParams } from "./schemas.js";
import type { VehicleService } from "./service.js";
import { getActor, requireAuth, requireRole } from "../../middlewares/auth.js";
import { asyncHandler, jsonOk } from "../../utils/http.js";

export function vehiclesRouter(vehicles: VehicleService) {
  const router = Router();

  /** Public inventory: bookable vehicles + taken intervals */
  router.get(
    "/vehicles/inventory",
    asyncHandler(async (_req, res) => {
      jsonOk(res, { items: await vehicles.listInventory() });
    })
  );

  const host = Router();
  host.use(requireAuth, requireRole("host"));

  host.get(
    "/",
    asyncHandler(async (req, res) => {
      jsonOk(res, { items: await vehicles.listHostVehicles(getActor(req)) });
    })
  );

  host.post(
    "/",
    asyncHandler(async (req, res) => {
      const body = createVehicleBody.parse(req.body);
      const vehicle = await vehicles.createVehicle(getActor(req), body);
      jsonOk(res, { success: true, vehicle, message: `Vehicle '${vehicle.name}' listed successfully!` }, 201);
    })
  );

  // before "/:id" so "insights" is never read as an id
  host.get(
    "/insights",
    asyncHandler(async (req, res) => {
      jsonOk(res, await vehicles.demandInsights(getActor(req)));
    })
  );

  host.patch(
    "/:id",
    asyncHandler(async (req, res) => {
      const { id } = vehicleParams.parse(req.params);
      const patch = updateVehicleBody.parse(req.body);
      const vehicle = await vehicles.updateVehicle(getActor(req), id, patch);
      jsonOk(res, { success: true, vehicle, message: `Vehicle '${vehicle.name}' updated successfully!` });
    })
  );

  host.post(
    "/:id/availability",
    asyncHandler(async (req, res) => {
      const { id } = vehicleParams.parse(req.params);
      const vehicle = await vehicles.toggleVehicleAvailability(getActor(req), id);
      jsonOk(res, { success: true, vehicleId: vehicle.id, isAvailable: vehicle.isAvailable });
    })
  );

  router.use("/host/vehicles", host);

  return router;
}
