import { AsyncLocalStorage } from "node:async_hooks";
import type {
  Address,
  Asset,
  AssetCategory,
  LedgerEntry,
  LedgerEntryKind,
  NewLedgerEntry,
} from "../types";
import type { MarketStore, MarketWriter } from "./store";
import type { Sql } from "./index";
import { ReentrantCallError } from "../services/errors";
import { logger } from "../utils/logger";

interface AssetRow {
  id: number;
  name: string;
  description: string;
  category: AssetCategory;
  price: string;
  metadata_ref: string;
  for_sale: boolean;
  created_at: Date;
}

interface LedgerRow {
  id: number;
  kind: LedgerEntryKind;
  asset_id: number | null;
  payer: string | null;
  destination: string | null;
  amount: string;
  created_at: Date;
}

interface StateRow {
  asset_counter: number;
  payout_recipient: string | null;
  engine_balance: string;
}

function toAsset(row: AssetRow): Asset {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    category: row.category,
    price: row.price,
    metadataRef: row.metadata_ref,
    forSale: row.for_sale,
    createdAt: row.created_at,
  };
}

function toLedgerEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    kind: row.kind,
    assetId: row.asset_id,
    payer: row.payer,
    destination: row.destination,
    amount: row.amount,
    createdAt: row.created_at,
  };
}

// 64-bit advisory lock key derived from a name
export function generateLockKey(...parts: string[]): bigint {
  const str = [...parts].sort().join("-");
  let hash = 0n;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5n) - hash + BigInt(str.charCodeAt(i));
  }
  return BigInt.asIntN(64, hash);
}

const MARKET_LOCK_KEY = generateLockKey("asset-exchange", "market");

class PostgresMarketView implements MarketWriter {
  constructor(protected readonly sql: Sql) {}

  async findAsset(id: number): Promise<Asset | undefined> {
    const rows = await this.sql<AssetRow[]>`
      SELECT * FROM assets WHERE id = ${id}
    `;
    return rows.length > 0 ? toAsset(rows[0]) : undefined;
  }

  async findOwner(id: number): Promise<Address | undefined> {
    const rows = await this.sql<{ owner: string }[]>`
      SELECT owner FROM asset_owners WHERE asset_id = ${id}
    `;
    return rows.length > 0 ? rows[0].owner : undefined;
  }

  async listAvailableIds(): Promise<number[]> {
    const rows = await this.sql<{ id: number }[]>`
      SELECT id FROM assets WHERE for_sale ORDER BY id ASC
    `;
    return rows.map((row) => row.id);
  }

  private async readState(): Promise<StateRow> {
    const rows = await this.sql<StateRow[]>`
      SELECT asset_counter, payout_recipient, engine_balance
      FROM market_state WHERE id = 1
    `;
    if (rows.length === 0) {
      throw new Error("market_state row is missing; apply db/schema.sql");
    }
    return rows[0];
  }

  async getPayoutRecipient(): Promise<Address | null> {
    return (await this.readState()).payout_recipient;
  }

  async getEngineBalance(): Promise<string> {
    return (await this.readState()).engine_balance;
  }

  async listLedgerEntries(limit: number, offset: number): Promise<LedgerEntry[]> {
    const rows = await this.sql<LedgerRow[]>`
      SELECT * FROM ledger_entries
      ORDER BY id DESC
      LIMIT ${limit} OFFSET ${offset}
    `;
    return rows.map(toLedgerEntry);
  }

  async lockAsset(id: number): Promise<Asset | undefined> {
    const rows = await this.sql<AssetRow[]>`
      SELECT * FROM assets WHERE id = ${id} FOR UPDATE
    `;
    return rows.length > 0 ? toAsset(rows[0]) : undefined;
  }

  async allocateAssetId(): Promise<number> {
    const rows = await this.sql<{ asset_counter: number }[]>`
      UPDATE market_state SET asset_counter = asset_counter + 1
      WHERE id = 1
      RETURNING asset_counter
    `;
    if (rows.length === 0) {
      throw new Error("market_state row is missing; apply db/schema.sql");
    }
    return rows[0].asset_counter;
  }

  async insertAsset(asset: Asset, owner: Address): Promise<void> {
    await this.sql`
      INSERT INTO assets (
        id, name, description, category, price, metadata_ref, for_sale, created_at
      ) VALUES (
        ${asset.id}, ${asset.name}, ${asset.description}, ${asset.category},
        ${asset.price}, ${asset.metadataRef}, ${asset.forSale}, ${asset.createdAt}
      )
    `;
    await this.sql`
      INSERT INTO asset_owners (asset_id, owner) VALUES (${asset.id}, ${owner})
    `;
  }

  async markSold(id: number): Promise<void> {
    await this.sql`
      UPDATE assets SET for_sale = FALSE WHERE id = ${id} AND for_sale
    `;
  }

  async setOwner(id: number, owner: Address): Promise<void> {
    await this.sql`
      UPDATE asset_owners SET owner = ${owner}, updated_at = NOW()
      WHERE asset_id = ${id}
    `;
  }

  async setPayoutRecipient(address: Address): Promise<void> {
    await this.sql`
      UPDATE market_state SET payout_recipient = ${address} WHERE id = 1
    `;
  }

  async setEngineBalance(balance: string): Promise<void> {
    await this.sql`
      UPDATE market_state SET engine_balance = ${balance} WHERE id = 1
    `;
  }

  async appendLedgerEntry(entry: NewLedgerEntry): Promise<LedgerEntry> {
    const [row] = await this.sql<LedgerRow[]>`
      INSERT INTO ledger_entries (kind, asset_id, payer, destination, amount)
      VALUES (${entry.kind}, ${entry.assetId}, ${entry.payer}, ${entry.destination}, ${entry.amount})
      RETURNING *
    `;
    return toLedgerEntry(row);
  }
}

export class PostgresMarketStore extends PostgresMarketView implements MarketStore {
  // A nested transaction would block on the advisory lock its parent holds
  private readonly active = new AsyncLocalStorage<true>();

  constructor(sql: Sql) {
    super(sql);
  }

  async transaction<T>(work: (tx: MarketWriter) => Promise<T>): Promise<T> {
    if (this.active.getStore()) {
      throw new ReentrantCallError("Nested store transaction");
    }
    const conn = await this.sql.reserve();
    try {
      await conn`BEGIN`;
      await conn`SET LOCAL lock_timeout = '5s'`;
      await conn`SET LOCAL statement_timeout = '10s'`;
      // One mutation at a time across every instance sharing the database
      await conn`SELECT pg_advisory_xact_lock(${MARKET_LOCK_KEY.toString()}::bigint)`;

      const result = await this.active.run(true, () => work(new PostgresMarketView(conn)));
      await conn`COMMIT`;
      return result;
    } catch (err) {
      try {
        await conn`ROLLBACK`;
      } catch (rollbackErr) {
        logger.error({ err: rollbackErr }, "Rollback failed");
      }
      throw err;
    } finally {
      conn.release();
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
