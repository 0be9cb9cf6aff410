import type Redis from "ioredis";
import type { Asset } from "../types";
import { ASSET_CATEGORIES } from "../types";
import { logger } from "../utils/logger";

export interface AssetCache {
  get(id: number): Promise<Asset | undefined>;
  set(asset: Asset): Promise<void>;
  invalidate(id: number): Promise<void>;
}

interface CachedAsset extends Omit<Asset, "createdAt"> {
  createdAt: string;
}

function isCachedAsset(value: unknown): value is CachedAsset {
  if (typeof value !== "object" || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.id === "number" &&
    typeof candidate.name === "string" &&
    typeof candidate.description === "string" &&
    ASSET_CATEGORIES.some((category) => category === candidate.category) &&
    typeof candidate.price === "string" &&
    typeof candidate.metadataRef === "string" &&
    typeof candidate.forSale === "boolean" &&
    typeof candidate.createdAt === "string"
  );
}

/**
 * Read-through cache of asset details. A cache failure never fails the
 * request; the registry falls back to the store.
 */
export class RedisAssetCache implements AssetCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number = 3600,
  ) {}

  private key(id: number): string {
    return `asset:${id}`;
  }

  async get(id: number): Promise<Asset | undefined> {
    try {
      const cached = await this.redis.get(this.key(id));
      if (!cached) return undefined;
      const parsed: unknown = JSON.parse(cached);
      if (!isCachedAsset(parsed)) {
        logger.warn({ assetId: id }, "Discarding malformed cached asset");
        await this.redis.del(this.key(id));
        return undefined;
      }
      return { ...parsed, createdAt: new Date(parsed.createdAt) };
    } catch (err) {
      logger.warn({ err, assetId: id }, "Asset cache read failed");
      return undefined;
    }
  }

  async set(asset: Asset): Promise<void> {
    try {
      await this.redis.set(
        this.key(asset.id),
        JSON.stringify({ ...asset, createdAt: asset.createdAt.toISOString() }),
        "EX",
        this.ttlSeconds,
      );
    } catch (err) {
      logger.warn({ err, assetId: asset.id }, "Asset cache write failed");
    }
  }

  async invalidate(id: number): Promise<void> {
    try {
      await this.redis.del(this.key(id));
    } catch (err) {
      logger.warn({ err, assetId: id }, "Asset cache invalidation failed");
    }
  }
}
