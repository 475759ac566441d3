/** Redis client singleton + ping + namespaced key builder */
import { createClient } from "redis";

import { env } from "./env.js";
import { errorMessage, logger } from "./logger.js";

export type RedisClient = ReturnType<typeof createClient>;

let client: RedisClient | null = null;

function getClient(): RedisClient {
  if (!client) {
    const useTls = env.REDIS_URL.startsWith("rediss://");

    client = createClient({
      url: env.REDIS_URL,
      socket: {
        ...(useTls ? { tls: true as const } : {}),
        connectTimeout: 3000,
        keepAlive: 5000, // prevent idle disconnects
        reconnectStrategy: (retries) => {
          // Backoff retry: wait up to 3s between retries
          const delay = Math.min(retries * 200, 3000);
          logger.warn("redis.reconnecting", { delay });
          return delay;
        },
      },
    });

    client.on("error", (e: unknown) => {
      logger.warn("redis.client_error", { error: errorMessage(e) });
    });

    client.on("ready", () => {
      logger.info("redis.ready");
    });
  }

  return client;
}

export async function redisClient(): Promise<RedisClient> {
  const c = getClient();
  if (!c.isOpen) await c.connect();
  return c;
}

export function key(...parts: Array<string | number>): string {
  return `${env.REDIS_NAMESPACE}:${parts.join(":")}`;
}

export async function pingRedis(): Promise<{ status: "ok" | "error"; message?: string }> {
  try {
    const c = await redisClient();
    await c.ping();
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: errorMessage(err) };
  }
}

export async function closeRedis() {
  if (client?.isOpen) await client.quit();
}
