import "dotenv/config";
import mongoose from "mongoose";

import { connectMongo } from "../src/config/db.js";
import { AuditLog } from "../src/modules/audit/model.js";
import { Booking } from "../src/modules/bookings/model.js";
import { DeviceToken } from "../src/modules/notifications/deviceModel.js";
import { Notification } from "../src/modules/notifications/model.js";
import { Review } from "../src/modules/reviews/model.js";
import { User } from "../src/modules/users/model.js";
import { Vehicle } from "../src/modules/vehicles/model.js";

const models = [User, Vehicle, Booking, Review, Notification, DeviceToken, AuditLog];

async function main() {
  await connectMongo();

  // 1) Sync model indexes (creates collections if needed)
  for (const m of models) {
    console.log(`→ syncing indexes for ${m.modelName}...`);
    await m.syncIndexes();
  }

  // 2) Print what ended up on each collection
  for (const m of models) {
    try {
      const idx = await m.collection.indexes();
      console.log(
        `${m.collection.collectionName} indexes:`,
        idx.map((i) => i.name)
      );
    } catch (e) {
      console.log(`${m.collection.collectionName}: could not list indexes ->`, e instanceof Error ? e.message : e);
    }
  }

  await mongoose.disconnect();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
