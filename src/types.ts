export const ASSET_CATEGORIES = ["GUN_SKIN", "CHARACTER_SKIN"] as const;

export type AssetCategory = (typeof ASSET_CATEGORIES)[number];

export type Address = string; // 0x-prefixed, 40 hex digits, lower case

export interface Asset {
  id: number;
  name: string;
  description: string;
  category: AssetCategory;
  price: string; // integer amount in the smallest currency unit
  metadataRef: string;
  forSale: boolean;
  createdAt: Date;
}

export interface NewAsset {
  name: string;
  description: string;
  category: AssetCategory;
  price: string | number;
  metadataRef: string;
  initialHolder?: Address;
}

export type LedgerEntryKind = "PURCHASE_PAYOUT" | "STRAY_DEPOSIT" | "STRAY_SWEEP";

export interface LedgerEntry {
  id: number;
  kind: LedgerEntryKind;
  assetId: number | null;
  payer: Address | null; // null is the engine's own balance
  destination: Address | null;
  amount: string;
  createdAt: Date;
}

export type NewLedgerEntry = Omit<LedgerEntry, "id" | "createdAt">;

export interface PurchaseRequest {
  assetId: number;
  recipient: Address;
  amount: string | number;
  buyer?: Address;
}

export interface PurchaseReceipt {
  assetId: number;
  recipient: Address;
  previousOwner: Address;
  price: string;
  amountPaid: string;
  payoutRecipient: Address;
}

export interface SweepReceipt {
  destination: Address;
  amount: string;
}

export interface PayoutRecipientChange {
  previous: Address | null;
  current: Address;
}
