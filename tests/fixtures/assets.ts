// Test Fixtures - Asset Data
import type { NewAsset } from "../../src/types";

export const dragonSkin: NewAsset = {
  name: "Dragon Skin",
  description: "Scaled finish for the standard rifle",
  category: "GUN_SKIN",
  price: 100,
  metadataRef: "ipfs://test-metadata/dragon-skin.json",
};

export const nightRunner: NewAsset = {
  name: "Night Runner",
  description: "Stealth outfit",
  category: "CHARACTER_SKIN",
  price: "250",
  metadataRef: "ipfs://test-metadata/night-runner.json",
};

export const freebie: NewAsset = {
  name: "Starter Camo",
  description: "Given away at launch",
  category: "GUN_SKIN",
  price: 0,
  metadataRef: "ipfs://test-metadata/starter-camo.json",
};

export function numberedAsset(n: number, price: number = 10): NewAsset {
  return {
    name: `Asset ${n}`,
    description: `Generated asset ${n}`,
    category: n % 2 === 0 ? "CHARACTER_SKIN" : "GUN_SKIN",
    price,
    metadataRef: `ipfs://test-metadata/${n}.json`,
  };
}
