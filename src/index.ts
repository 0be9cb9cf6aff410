import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { createSql } from "./db/index";
import { createRedis } from "./db/redis";
import { RedisAssetCache } from "./db/cache";
import { MemoryMarketStore } from "./db/memory.store";
import { PostgresMarketStore } from "./db/postgres.store";
import type { MarketStore } from "./db/store";
import { MarketEventEmitter } from "./events/eventEmitter";
import { AssetRegistry } from "./services/registry.service";
import { ExchangeEngine } from "./services/exchange.service";
import { HttpPayoutGateway } from "./services/payout.gateway";
import { logger } from "./utils/logger";

const config = loadConfig();
if (config.LOG_LEVEL) logger.level = config.LOG_LEVEL;

const redis = createRedis(config.REDIS_URL);
const eventEmitter = new MarketEventEmitter(1000, config.WEBHOOK_TIMEOUT_MS);

const store: MarketStore =
  config.STORE_DRIVER === "memory"
    ? new MemoryMarketStore()
    : new PostgresMarketStore(createSql(config.DATABASE_URL));

const registry = new AssetRegistry({
  store,
  administrator: config.ADMIN_ADDRESS,
  events: eventEmitter,
  cache: config.STORE_DRIVER === "postgres" ? new RedisAssetCache(redis) : undefined,
});

const exchange = new ExchangeEngine({
  store,
  registry,
  events: eventEmitter,
  payable: new HttpPayoutGateway({
    url: config.PAYOUT_GATEWAY_URL,
    secret: config.PAYOUT_GATEWAY_SECRET,
    timeoutMs: config.PAYOUT_GATEWAY_TIMEOUT_MS,
  }),
});

const app = createApp({
  registry,
  exchange,
  events: eventEmitter,
  adminApiKey: config.ADMIN_API_KEY,
  redis,
  rateLimit: { windowMs: config.RATE_LIMIT_WINDOW_MS, max: config.RATE_LIMIT_MAX },
});

logger.info(
  { port: config.PORT, store: config.STORE_DRIVER, administrator: registry.administrator },
  "Server is starting",
);

const server = serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  logger.info(`Server is listening on port ${info.port}`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  server.close();
  await store.close();
  redis.disconnect();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      },
    );
  });
}
