import type { Context, Next } from "hono";
import type Redis from "ioredis";
import { logger } from "../utils/logger";

interface RateLimitConfig {
  redis: Redis;
  windowMs: number;
  max: number;
  keyPrefix?: string;
}

// Fixed-window limiter keyed by client address
export const rateLimiter = (config: RateLimitConfig) => {
  const { redis, windowMs, max, keyPrefix = "rl" } = config;

  return async (c: Context, next: Next) => {
    if (process.env.NODE_ENV === "test") {
      return await next();
    }

    const ip = c.req.header("x-forwarded-for") || "unknown";
    const key = `${keyPrefix}:${ip}`;

    let count: number;
    try {
      const current = await redis.get(key);
      count = current ? parseInt(current, 10) : 0;

      if (count < max) {
        const multi = redis.multi();
        multi.incr(key);
        if (count === 0) {
          multi.pexpire(key, windowMs);
        }
        await multi.exec();
      }
    } catch (err) {
      // Fail open while Redis is unavailable
      logger.error({ err }, "Rate limiter error");
      return await next();
    }

    if (count >= max) {
      logger.warn({ ip, key }, "Rate limit exceeded");
      return c.json({ error: "Too many requests", code: "RATE_LIMITED" }, 429);
    }

    await next();
  };
};
