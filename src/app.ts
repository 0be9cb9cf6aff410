import { OpenAPIHono } from "@hono/zod-openapi";
import { HTTPException } from "hono/http-exception";
import { logger as honoLogger } from "hono/logger";
import { swaggerUI } from "@hono/swagger-ui";
import type Redis from "ioredis";
import type { AssetRegistry } from "./services/registry.service";
import type { ExchangeEngine } from "./services/exchange.service";
import type { MarketEventEmitter } from "./events/eventEmitter";
import { MarketError } from "./services/errors";
import { createAssetRoutes } from "./routes/assets";
import { createExchangeRoutes } from "./routes/exchange";
import { createWebhookRoutes } from "./routes/webhooks";
import metricsRoutes from "./routes/metrics";
import { metricsMiddleware } from "./monitoring/metrics";
import { rateLimiter } from "./middlewares/rateLimiter";
import { actor, type AppEnv } from "./middlewares/actor";
import { logger } from "./utils/logger";

export interface AppDependencies {
  registry: AssetRegistry;
  exchange: ExchangeEngine;
  events: MarketEventEmitter;
  adminApiKey: string;
  // Requests are rate limited only when a Redis client is supplied
  redis?: Redis;
  rateLimit?: { windowMs: number; max: number };
}

export function createApp(deps: AppDependencies) {
  const app = new OpenAPIHono<AppEnv>();
  const rateLimit = deps.rateLimit ?? { windowMs: 60 * 1000, max: 1000 };

  app.use(honoLogger((str) => logger.info(str)));
  app.use("*", metricsMiddleware());
  if (deps.redis) {
    app.use("*", rateLimiter({ ...rateLimit, redis: deps.redis, keyPrefix: "global" }));
  }

  const resolveActor = actor({
    administrator: deps.registry.administrator,
    adminApiKey: deps.adminApiKey,
  });
  app.use("/assets/*", resolveActor);
  app.use("/exchange/*", resolveActor);

  app.onError((err, c) => {
    if (err instanceof MarketError) {
      return c.json({ error: err.message, code: err.code }, err.status);
    }
    if (err instanceof HTTPException) {
      return c.json({ error: err.message, code: "BAD_REQUEST" }, err.status);
    }
    logger.error({ err, method: c.req.method, path: c.req.path }, "Unhandled error");
    return c.json({ error: "Internal server error", code: "INTERNAL" }, 500);
  });

  app.get("/", (c) => {
    return c.json({
      service: "Asset Exchange Service",
      version: "1.0.0",
      status: "running",
      endpoints: {
        assets: "/assets",
        exchange: "/exchange",
        webhooks: "/webhooks",
        metrics: "/metrics",
        health: "/metrics/health",
        swagger: "/swagger",
        docs: "/doc",
      },
    });
  });

  app.route("/assets", createAssetRoutes(deps.registry));
  app.route("/exchange", createExchangeRoutes(deps.exchange));
  app.route("/webhooks", createWebhookRoutes(deps.events));
  app.route("/metrics", metricsRoutes);

  app.doc("/doc", {
    openapi: "3.0.0",
    info: {
      version: "1.0.0",
      title: "Asset Exchange API",
      description:
        "Mint unique assets, list them for sale and settle purchases against a single payout recipient",
    },
  });

  app.get("/swagger", swaggerUI({ url: "/doc" }));

  return app;
}

export type App = ReturnType<typeof createApp>;
