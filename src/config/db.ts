/** Mongo connector + ping using Mongoose. Booking confirmation needs transactions, so point MONGO_URI at a replica set. */
import mongoose from "mongoose";

import { env } from "./env.js";
import { errorMessage } from "./logger.js";

let connecting: Promise<void> | null = null;

export async function connectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  if (connecting) return connecting;

  connecting = mongoose
    .connect(env.MONGO_URI, { serverSelectionTimeoutMS: 3000 })
    .then(() => {}) // ensure Promise<void>
    .finally(() => {
      connecting = null;
    });

  await connecting;
}

export async function pingMongo(): Promise<{ status: "ok" | "error"; message?: string }> {
  try {
    await connectMongo();
    const db = mongoose.connection.db;
    if (!db) throw new Error("Mongo connection not ready");
    await db.admin().command({ ping: 1 });
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: errorMessage(err) };
  }
}

export async function closeMongo() {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
