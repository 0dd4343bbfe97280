import { Redis } from "ioredis";

import { logger as rootLogger } from "./logger.js";

const logger = rootLogger.child({ component: "redis" });

let client: Redis | null = null;

/** Lazily connects the shared publisher used for alert delivery. */
export function getRedisClient(url: string): Redis {
  if (!client) {
    const redis = new Redis(url, {
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
    });

    redis.on("connect", () => {
      logger.info({ event: "redis_connect" }, "Redis connection established");
    });
    redis.on("error", (error: Error) => {
      logger.error({ error, event: "redis_error" }, "Redis client error");
    });
    redis.on("close", () => {
      logger.warn({ event: "redis_close" }, "Redis connection closed");
    });

    client = redis;
  }

  return client;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) {
    return;
  }

  const redis = client;
  client = null;

  try {
    await redis.quit();
  } catch (error) {
    logger.warn({ error, event: "redis_quit_error" }, "Error quitting Redis connection");
  }
  redis.removeAllListeners();
}
