import { AsyncLocalStorage } from "node:async_hooks";
import type { Address, Asset, LedgerEntry, NewLedgerEntry } from "../types";
import type { MarketStore, MarketWriter } from "./store";
import { ReentrantCallError } from "../services/errors";

interface MarketState {
  counter: number;
  assets: Map<number, Asset>;
  owners: Map<number, Address>;
  payoutRecipient: Address | null;
  engineBalance: string;
  ledger: LedgerEntry[];
}

function emptyState(): MarketState {
  return {
    counter: 0,
    assets: new Map(),
    owners: new Map(),
    payoutRecipient: null,
    engineBalance: "0",
    ledger: [],
  };
}

function cloneState(state: MarketState): MarketState {
  return {
    counter: state.counter,
    assets: new Map(
      [...state.assets].map(([id, asset]) => [id, { ...asset }]),
    ),
    owners: new Map(state.owners),
    payoutRecipient: state.payoutRecipient,
    engineBalance: state.engineBalance,
    ledger: [...state.ledger],
  };
}

class MemoryMarketView implements MarketWriter {
  constructor(protected state: MarketState) {}

  async findAsset(id: number): Promise<Asset | undefined> {
    const asset = this.state.assets.get(id);
    return asset ? { ...asset } : undefined;
  }

  async findOwner(id: number): Promise<Address | undefined> {
    return this.state.owners.get(id);
  }

  async listAvailableIds(): Promise<number[]> {
    return [...this.state.assets.values()]
      .filter((asset) => asset.forSale)
      .map((asset) => asset.id)
      .sort((a, b) => a - b);
  }

  async getPayoutRecipient(): Promise<Address | null> {
    return this.state.payoutRecipient;
  }

  async getEngineBalance(): Promise<string> {
    return this.state.engineBalance;
  }

  async listLedgerEntries(limit: number, offset: number): Promise<LedgerEntry[]> {
    return [...this.state.ledger]
      .reverse()
      .slice(offset, offset + limit)
      .map((entry) => ({ ...entry }));
  }

  // Transactions are already serialized, so there is nothing extra to lock
  async lockAsset(id: number): Promise<Asset | undefined> {
    return this.findAsset(id);
  }

  async allocateAssetId(): Promise<number> {
    this.state.counter += 1;
    return this.state.counter;
  }

  async insertAsset(asset: Asset, owner: Address): Promise<void> {
    this.state.assets.set(asset.id, { ...asset });
    this.state.owners.set(asset.id, owner);
  }

  async markSold(id: number): Promise<void> {
    const asset = this.state.assets.get(id);
    if (!asset) throw new Error(`Cannot mark missing asset ${id} as sold`);
    asset.forSale = false;
  }

  async setOwner(id: number, owner: Address): Promise<void> {
    if (!this.state.owners.has(id)) {
      throw new Error(`Cannot reassign missing asset ${id}`);
    }
    this.state.owners.set(id, owner);
  }

  async setPayoutRecipient(address: Address): Promise<void> {
    this.state.payoutRecipient = address;
  }

  async setEngineBalance(balance: string): Promise<void> {
    this.state.engineBalance = balance;
  }

  async appendLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const stored: LedgerEntry = {
      ...entry,
      id: this.state.ledger.length + 1,
      createdAt: new Date(),
    };
    this.state.ledger.push(stored);
    return { ...stored };
  }
}

/**
 * In-process store. Transactions queue behind each other and work on a
 * copy of the state that replaces the committed one only when the callback
 * resolves.
 */
export class MemoryMarketStore extends MemoryMarketView implements MarketStore {
  private tail: Promise<void> = Promise.resolve();
  // Present while a transaction callback runs; a nested transaction would wait on itself
  private readonly active = new AsyncLocalStorage<true>();

  constructor() {
    super(emptyState());
  }

  transaction<T>(work: (tx: MarketWriter) => Promise<T>): Promise<T> {
    if (this.active.getStore()) {
      return Promise.reject(new ReentrantCallError("Nested store transaction"));
    }
    const run = this.tail.then(() => this.execute(work));
    // The queue only needs to know when `run` settles; its outcome reaches the caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async execute<T>(work: (tx: MarketWriter) => Promise<T>): Promise<T> {
    const draft = cloneState(this.state);
    const result = await this.active.run(true, () => work(new MemoryMarketView(draft)));
    this.state = draft;
    return result;
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
