import type { Address, Asset, LedgerEntry, NewLedgerEntry } from "../types";

// Read side, shared by committed reads and reads inside a transaction
export interface MarketReader {
  findAsset(id: number): Promise<Asset | undefined>;
  findOwner(id: number): Promise<Address | undefined>;
  listAvailableIds(): Promise<number[]>;
  getPayoutRecipient(): Promise<Address | null>;
  getEngineBalance(): Promise<string>;
  listLedgerEntries(limit: number, offset: number): Promise<LedgerEntry[]>;
}

export interface MarketWriter extends MarketReader {
  // Locks the asset row for the rest of the transaction
  lockAsset(id: number): Promise<Asset | undefined>;
  allocateAssetId(): Promise<number>;
  insertAsset(asset: Asset, owner: Address): Promise<void>;
  markSold(id: number): Promise<void>;
  setOwner(id: number, owner: Address): Promise<void>;
  setPayoutRecipient(address: Address): Promise<void>;
  setEngineBalance(balance: string): Promise<void>;
  appendLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry>;
}

/**
 * Transactional repository over the registry and exchange state.
 *
 * `transaction` runs one logical mutation at a time: the callback's writes
 * become visible together when it resolves, and none of them survive if it
 * throws.
 */
export interface MarketStore extends MarketReader {
  transaction<T>(work: (tx: MarketWriter) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
