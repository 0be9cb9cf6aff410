import Redis from "ioredis";
import { logger } from "../utils/logger";

// Connects on first command, so creating a client never opens a socket
export function createRedis(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on("connect", () => {
    logger.info("Connected to Redis");
  });

  redis.on("error", (err) => {
    logger.error(err, "Redis error");
  });

  return redis;
}
