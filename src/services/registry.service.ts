import type { Address, Asset, NewAsset } from "../types";
import type { MarketStore, MarketWriter } from "../db/store";
import type { AssetCache } from "../db/cache";
import { type MarketEventEmitter, eventEmitter } from "../events/eventEmitter";
import {
  AssetNotFoundError,
  InvalidAmountError,
  InvalidRecipientError,
  UnauthorizedError,
} from "./errors";
import { isValidDestination, normalizeAddress } from "../utils/address";
import { formatAmount, parseAmount } from "../utils/amount";
import { isAssetId } from "../utils/assetId";
import { trackAvailableAssets, trackMint } from "../monitoring/metrics";
import { logger } from "../utils/logger";

export interface AssetRegistryOptions {
  store: MarketStore;
  administrator: Address;
  events?: MarketEventEmitter;
  cache?: AssetCache;
}

export class AssetRegistry {
  private readonly store: MarketStore;
  private readonly events: MarketEventEmitter;
  private readonly cache?: AssetCache;
  // Bumped by invalidate; a read fills the cache only if no invalidation happened since it began
  private readonly cacheGenerations = new Map<number, number>();
  readonly administrator: Address;

  constructor(options: AssetRegistryOptions) {
    if (!isValidDestination(options.administrator)) {
      throw new InvalidRecipientError(options.administrator);
    }
    this.store = options.store;
    this.administrator = normalizeAddress(options.administrator);
    this.events = options.events ?? eventEmitter;
    this.cache = options.cache;
  }

  isAdministrator(caller: Address | null | undefined): boolean {
    return typeof caller === "string" && normalizeAddress(caller) === this.administrator;
  }

  requireAdministrator(caller: Address | null | undefined): void {
    if (!this.isAdministrator(caller)) {
      logger.warn({ caller }, "Rejected restricted call from non-administrator");
      throw new UnauthorizedError();
    }
  }

  // Mint a new asset listed for sale, owned by the administrator unless an initial holder is named
  async createAsset(caller: Address | null | undefined, input: NewAsset): Promise<Asset> {
    this.requireAdministrator(caller);

    const price = parseAmount(input.price);
    if (!price) throw new InvalidAmountError(input.price);

    let holder = this.administrator;
    if (input.initialHolder !== undefined) {
      if (!isValidDestination(input.initialHolder)) {
        throw new InvalidRecipientError(input.initialHolder);
      }
      holder = normalizeAddress(input.initialHolder);
    }

    const asset = await this.store.transaction(async (tx) => {
      const id = await tx.allocateAssetId();
      const created: Asset = {
        id,
        name: input.name,
        description: input.description,
        category: input.category,
        price: formatAmount(price),
        metadataRef: input.metadataRef,
        forSale: true,
        createdAt: new Date(),
      };
      await tx.insertAsset(created, holder);
      return created;
    });

    trackMint(asset.category);
    logger.info(
      { assetId: asset.id, category: asset.category, price: asset.price, holder },
      "Asset created",
    );
    await this.events.emit({
      eventType: "ASSET_CREATED",
      data: {
        assetId: asset.id,
        name: asset.name,
        category: asset.category,
        price: asset.price,
      },
    });

    return asset;
  }

  async getAssetDetails(id: number): Promise<Asset> {
    if (!isAssetId(id)) throw new AssetNotFoundError(id);

    const cached = await this.cache?.get(id);
    if (cached && cached.id === id) return cached;

    const generation = this.cacheGenerations.get(id) ?? 0;
    const asset = await this.store.findAsset(id);
    if (!asset || asset.id !== id) throw new AssetNotFoundError(id);

    if (this.cache && generation === (this.cacheGenerations.get(id) ?? 0)) {
      await this.cache.set(asset);
      // An invalidation that landed during the write must win
      if (generation !== (this.cacheGenerations.get(id) ?? 0)) {
        await this.cache.invalidate(id);
      }
    }
    return asset;
  }

  async ownerOf(id: number): Promise<Address> {
    if (!isAssetId(id)) throw new AssetNotFoundError(id);
    const owner = await this.store.findOwner(id);
    if (!owner) throw new AssetNotFoundError(id);
    return owner;
  }

  async listAvailable(): Promise<number[]> {
    const ids = await this.store.listAvailableIds();
    trackAvailableAssets(ids.length);
    return ids;
  }

  /**
   * Reassign the holder of an asset. Only reachable with a store transaction,
   * which the exchange holds while settling a purchase.
   */
  async transferOwnership(
    tx: MarketWriter,
    id: number,
    newOwner: Address,
  ): Promise<Address> {
    const previous = await tx.findOwner(id);
    if (!previous) throw new AssetNotFoundError(id);
    await tx.setOwner(id, normalizeAddress(newOwner));
    return previous;
  }

  async invalidate(id: number): Promise<void> {
    if (!this.cache) return;
    this.cacheGenerations.set(id, (this.cacheGenerations.get(id) ?? 0) + 1);
    await this.cache.invalidate(id);
  }
}
