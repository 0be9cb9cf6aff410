import { describe, test, expect, beforeEach, vi } from "vitest";
import { AssetRegistry } from "../../src/services/registry.service";
import { MemoryMarketStore } from "../../src/db/memory.store";
import {
  AssetNotFoundError,
  InvalidAmountError,
  InvalidRecipientError,
  UnauthorizedError,
} from "../../src/services/errors";
import {
  ADMIN_ADDRESS,
  BUYER_ADDRESS,
  OTHER_ADDRESS,
  PAYOUT_ADDRESS,
  RECIPIENT_ADDRESS,
  ZERO_ADDRESS,
} from "../fixtures/addresses";
import { dragonSkin, nightRunner, numberedAsset } from "../fixtures/assets";
import { createTestMarket, MapAssetCache, type TestMarket } from "../fixtures/market";
import type { Asset } from "../../src/types";

// Holds every cache write until released
class GatedAssetCache extends MapAssetCache {
  waiting = false;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  async set(asset: Asset): Promise<void> {
    this.waiting = true;
    await this.gate;
    await super.set(asset);
  }

  open(): void {
    this.release();
  }
}

describe("AssetRegistry - Unit Tests", () => {
  let market: TestMarket;

  beforeEach(() => {
    market = createTestMarket();
  });

  describe("constructor", () => {
    test("should reject an invalid administrator address", () => {
      expect(
        () =>
          new AssetRegistry({
            store: new MemoryMarketStore(),
            administrator: ZERO_ADDRESS,
          }),
      ).toThrow(InvalidRecipientError);
    });

    test("should normalize the administrator address", () => {
      const registry = new AssetRegistry({
        store: new MemoryMarketStore(),
        administrator: ADMIN_ADDRESS.toUpperCase().replace("0X", "0x"),
      });
      expect(registry.administrator).toBe(ADMIN_ADDRESS);
      expect(registry.isAdministrator(ADMIN_ADDRESS)).toBe(true);
    });
  });

  describe("createAsset()", () => {
    test("should assign sequential ids starting at 1", async () => {
      const first = await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      const second = await market.registry.createAsset(ADMIN_ADDRESS, nightRunner);
      const third = await market.registry.createAsset(ADMIN_ADDRESS, numberedAsset(3));

      expect([first.id, second.id, third.id]).toEqual([1, 2, 3]);
    });

    test("should store the asset listed for sale with a normalized price", async () => {
      const asset = await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);

      expect(asset).toEqual({
        id: 1,
        name: "Dragon Skin",
        description: "Scaled finish for the standard rifle",
        category: "GUN_SKIN",
        price: "100",
        metadataRef: "ipfs://test-metadata/dragon-skin.json",
        forSale: true,
        createdAt: expect.any(Date),
      });
    });

    test("should accept leading zeros and exponent notation for whole prices", async () => {
      const padded = await market.registry.createAsset(ADMIN_ADDRESS, {
        ...dragonSkin,
        price: "0100",
      });
      const exponent = await market.registry.createAsset(ADMIN_ADDRESS, {
        ...dragonSkin,
        price: "1e3",
      });

      expect(padded.price).toBe("100");
      expect(exponent.price).toBe("1000");
    });

    test("should mint ownership to the administrator by default", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      expect(await market.registry.ownerOf(1)).toBe(ADMIN_ADDRESS);
    });

    test("should mint ownership to a designated initial holder", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, {
        ...dragonSkin,
        initialHolder: "0xC000000000000000000000000000000000000004",
      });
      expect(await market.registry.ownerOf(1)).toBe(RECIPIENT_ADDRESS);
    });

    test("should reject the zero address as initial holder", async () => {
      await expect(
        market.registry.createAsset(ADMIN_ADDRESS, {
          ...dragonSkin,
          initialHolder: ZERO_ADDRESS,
        }),
      ).rejects.toBeInstanceOf(InvalidRecipientError);
    });

    test.each([-5, 1.5, "ten", ""])(
      "should reject price %j",
      async (price) => {
        await expect(
          market.registry.createAsset(ADMIN_ADDRESS, { ...dragonSkin, price }),
        ).rejects.toBeInstanceOf(InvalidAmountError);
      },
    );

    test.each([BUYER_ADDRESS, PAYOUT_ADDRESS, null, undefined])(
      "should reject caller %s with Unauthorized",
      async (caller) => {
        const attempt = market.registry.createAsset(caller, dragonSkin);
        await expect(attempt).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(attempt).rejects.toMatchObject({
          code: "UNAUTHORIZED",
          status: 403,
        });
      },
    );

    test("should not consume an id when creation is rejected", async () => {
      await expect(
        market.registry.createAsset(BUYER_ADDRESS, dragonSkin),
      ).rejects.toBeInstanceOf(UnauthorizedError);

      const asset = await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      expect(asset.id).toBe(1);
    });

    test("should accept the administrator address in any case", async () => {
      const asset = await market.registry.createAsset(
        ADMIN_ADDRESS.toUpperCase().replace("0X", "0x"),
        dragonSkin,
      );
      expect(asset.id).toBe(1);
    });

    test("should emit ASSET_CREATED", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);

      const [event] = market.events.getHistory();
      expect(event.eventType).toBe("ASSET_CREATED");
      expect(event.data).toEqual({
        assetId: 1,
        name: "Dragon Skin",
        category: "GUN_SKIN",
        price: "100",
      });
    });
  });

  describe("getAssetDetails()", () => {
    test("should return the stored asset", async () => {
      const created = await market.registry.createAsset(ADMIN_ADDRESS, nightRunner);
      expect(await market.registry.getAssetDetails(1)).toEqual(created);
    });

    test.each([0, -1, 2, 999, 1.5, Number.NaN])(
      "should fail with NotFound for id %s",
      async (id) => {
        await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
        await expect(market.registry.getAssetDetails(id)).rejects.toBeInstanceOf(
          AssetNotFoundError,
        );
      },
    );

    test("should be a pure read of registry state", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);

      const first = await market.registry.getAssetDetails(1);
      const second = await market.registry.getAssetDetails(1);
      expect(second).toEqual(first);
    });

    test("should not expose the stored record to mutation", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);

      const asset = await market.registry.getAssetDetails(1);
      asset.forSale = false;

      expect((await market.registry.getAssetDetails(1)).forSale).toBe(true);
    });
  });

  describe("ownerOf()", () => {
    test("should fail with NotFound for ids past the stored id range without a lookup", async () => {
      const findAsset = vi.spyOn(market.store, "findAsset");
      const findOwner = vi.spyOn(market.store, "findOwner");

      for (const id of [2 ** 31, 99999999999]) {
        await expect(market.registry.getAssetDetails(id)).rejects.toBeInstanceOf(
          AssetNotFoundError,
        );
        await expect(market.registry.ownerOf(id)).rejects.toBeInstanceOf(AssetNotFoundError);
      }
      expect(findAsset).not.toHaveBeenCalled();
      expect(findOwner).not.toHaveBeenCalled();
    });

    test("should fail with NotFound for an unassigned id", async () => {
      await expect(market.registry.ownerOf(1)).rejects.toBeInstanceOf(
        AssetNotFoundError,
      );
    });
  });

  describe("listAvailable()", () => {
    test("should return an empty list for an empty registry", async () => {
      expect(await market.registry.listAvailable()).toEqual([]);
    });

    test("should list every asset for sale in ascending order", async () => {
      for (let n = 1; n <= 5; n++) {
        await market.registry.createAsset(ADMIN_ADDRESS, numberedAsset(n));
      }
      expect(await market.registry.listAvailable()).toEqual([1, 2, 3, 4, 5]);
    });

    test("should return identical results without intervening mutation", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      await market.registry.createAsset(ADMIN_ADDRESS, nightRunner);

      const first = await market.registry.listAvailable();
      const second = await market.registry.listAvailable();
      expect(second).toEqual(first);
    });

    test("should leave out sold assets", async () => {
      await market.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      await market.registry.createAsset(ADMIN_ADDRESS, nightRunner);
      await market.registry.createAsset(ADMIN_ADDRESS, numberedAsset(3));
      await market.exchange.setPayoutRecipient(ADMIN_ADDRESS, PAYOUT_ADDRESS);

      await market.exchange.purchase({
        assetId: 2,
        recipient: OTHER_ADDRESS,
        amount: 250,
      });

      expect(await market.registry.listAvailable()).toEqual([1, 3]);
    });
  });

  describe("asset cache", () => {
    test("should serve repeated reads from the cache", async () => {
      const cache = new MapAssetCache();
      const cached = createTestMarket({ cache });
      await cached.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      const findAsset = vi.spyOn(cached.store, "findAsset");

      await cached.registry.getAssetDetails(1);
      await cached.registry.getAssetDetails(1);

      expect(findAsset).toHaveBeenCalledTimes(1);
      expect(cache.entries.has(1)).toBe(true);
    });

    test("should drop the cached asset once it is sold", async () => {
      const cache = new MapAssetCache();
      const cached = createTestMarket({ cache });
      await cached.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      await cached.exchange.setPayoutRecipient(ADMIN_ADDRESS, PAYOUT_ADDRESS);
      expect((await cached.registry.getAssetDetails(1)).forSale).toBe(true);

      await cached.exchange.purchase({
        assetId: 1,
        recipient: RECIPIENT_ADDRESS,
        amount: 100,
      });

      expect(cache.entries.has(1)).toBe(false);
      expect((await cached.registry.getAssetDetails(1)).forSale).toBe(false);
    });

    test("should not let a read that overlaps a purchase cache the old sale flag", async () => {
      const cache = new GatedAssetCache();
      const cached = createTestMarket({ cache });
      await cached.registry.createAsset(ADMIN_ADDRESS, dragonSkin);
      await cached.exchange.setPayoutRecipient(ADMIN_ADDRESS, PAYOUT_ADDRESS);

      const read = cached.registry.getAssetDetails(1);
      await vi.waitFor(() => expect(cache.waiting).toBe(true));
      await cached.exchange.purchase({
        assetId: 1,
        recipient: RECIPIENT_ADDRESS,
        amount: 100,
      });
      cache.open();

      expect((await read).forSale).toBe(true);
      expect(cache.entries.has(1)).toBe(false);
      expect((await cached.registry.getAssetDetails(1)).forSale).toBe(false);
    });
  });
});
