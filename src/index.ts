// src/index.ts
/** Boot file: connects data deps, builds the app, starts listening, and handles graceful shutdown. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { errorMessage, logger } from "./config/logger.js";
import { pingRedis, closeRedis } from "./config/redis.js";
import { createContainer } from "./container.js";

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { message: err.message, stack: err.stack });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { reason: errorMessage(reason) });
});

let server: http.Server | null = null;

const start = async () => {
  // ensure data deps are up before listening
  await connectMongo();
  const redis = await pingRedis();
  if (redis.status === "error") throw new Error(`redis unavailable: ${redis.message}`);

  const app = createApp(await createContainer());
  server = http.createServer(app);
  server.listen(env.PORT, () => {
    logger.info(`Rental server listening on :${env.PORT}`, { env: env.NODE_ENV });
  });
};

const shutdown = (signal: string) => {
  logger.warn(`Received ${signal}, shutting down...`);
  void Promise.allSettled([closeMongo(), closeRedis()]).finally(() => {
    if (!server) process.exit(0);
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
    setTimeout(() => {
      logger.error("Forced shutdown");
      process.exit(1);
    }, 10_000).unref();
  });
};

(["SIGINT", "SIGTERM"] as const).forEach((sig) => process.on(sig, () => shutdown(sig)));

start().catch((err: unknown) => {
  logger.error("Startup failed", {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
