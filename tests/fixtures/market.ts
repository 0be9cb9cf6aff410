// Test Fixtures - Wired registry and exchange over the in-memory store
import { MemoryMarketStore } from "../../src/db/memory.store";
import type { AssetCache } from "../../src/db/cache";
import type { Asset } from "../../src/types";
import { MarketEventEmitter } from "../../src/events/eventEmitter";
import { AssetRegistry } from "../../src/services/registry.service";
import { ExchangeEngine } from "../../src/services/exchange.service";
import { createApp } from "../../src/app";
import { FakePayable } from "./payable";
import { ADMIN_ADDRESS, ADMIN_API_KEY } from "./addresses";

export function createTestMarket(options: { cache?: AssetCache } = {}) {
  const store = new MemoryMarketStore();
  const events = new MarketEventEmitter();
  const payable = new FakePayable();
  const registry = new AssetRegistry({
    store,
    administrator: ADMIN_ADDRESS,
    events,
    cache: options.cache,
  });
  const exchange = new ExchangeEngine({ store, registry, payable, events });
  return { store, events, payable, registry, exchange };
}

export type TestMarket = ReturnType<typeof createTestMarket>;

export function createTestApp() {
  const market = createTestMarket();
  const app = createApp({
    registry: market.registry,
    exchange: market.exchange,
    events: market.events,
    adminApiKey: ADMIN_API_KEY,
  });
  return { ...market, app };
}

export class MapAssetCache implements AssetCache {
  readonly entries = new Map<number, Asset>();

  async get(id: number): Promise<Asset | undefined> {
    return this.entries.get(id);
  }

  async set(asset: Asset): Promise<void> {
    this.entries.set(asset.id, asset);
  }

  async invalidate(id: number): Promise<void> {
    this.entries.delete(id);
  }
}
