import { AsyncLocalStorage } from "node:async_hooks";
import Decimal from "decimal.js";
import type {
  Address,
  LedgerEntry,
  PayoutRecipientChange,
  PurchaseReceipt,
  PurchaseRequest,
  SweepReceipt,
} from "../types";
import type { MarketStore, MarketWriter } from "../db/store";
import type { Payable } from "./payable";
import type { AssetRegistry } from "./registry.service";
import { type MarketEventEmitter, eventEmitter } from "../events/eventEmitter";
import {
  AssetNotFoundError,
  InsufficientPaymentError,
  InvalidAmountError,
  InvalidRecipientError,
  MarketError,
  NotForSaleError,
  NothingToWithdrawError,
  PayoutNotConfiguredError,
  ReentrantCallError,
  TransferFailedError,
} from "./errors";
import { isValidDestination, normalizeAddress } from "../utils/address";
import { formatAmount, parseAmount } from "../utils/amount";
import { isAssetId } from "../utils/assetId";
import { trackPurchase, trackSweep } from "../monitoring/metrics";
import { logger } from "../utils/logger";

export interface ExchangeEngineOptions {
  store: MarketStore;
  registry: AssetRegistry;
  payable: Payable;
  events?: MarketEventEmitter;
}

interface Settlement {
  assetId: number | null; // null while sweeping stray funds
}

export const MAX_LEDGER_PAGE = 100;

export class ExchangeEngine {
  private readonly store: MarketStore;
  private readonly registry: AssetRegistry;
  private readonly payable: Payable;
  private readonly events: MarketEventEmitter;
  // Set for the duration of every call into the Payable port
  private readonly settlement = new AsyncLocalStorage<Settlement>();

  constructor(options: ExchangeEngineOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.payable = options.payable;
    this.events = options.events ?? eventEmitter;
  }

  /**
   * Sell an asset to `recipient` for `amount`.
   *
   * Preconditions are checked in a fixed order and the first one that fails
   * aborts the purchase. The sale flag flips and ownership moves before the
   * payment is forwarded; if forwarding is rejected, the whole transaction
   * rolls back and the purchase fails with TransferFailedError.
   *
   * The full amount is forwarded. Overpayment is not refunded.
   */
  async purchase(request: PurchaseRequest): Promise<PurchaseReceipt> {
    const active = this.settlement.getStore();
    if (active) {
      const err =
        active.assetId === request.assetId
          ? new NotForSaleError(request.assetId)
          : new ReentrantCallError(`Purchase of asset ${request.assetId}`);
      trackPurchase("failed", err.code);
      logger.warn({ assetId: request.assetId, settling: active.assetId }, "Rejected re-entrant purchase");
      throw err;
    }

    let receipt: PurchaseReceipt;
    try {
      receipt = await this.store.transaction((tx) => this.settlePurchase(tx, request));
    } catch (err) {
      await this.reportFailedPurchase(request.assetId, err);
      throw err;
    }

    await this.registry.invalidate(receipt.assetId);
    trackPurchase("success");
    logger.info(
      {
        assetId: receipt.assetId,
        recipient: receipt.recipient,
        price: receipt.price,
        amountPaid: receipt.amountPaid,
      },
      "Asset purchased",
    );
    await this.events.emit({
      eventType: "ASSET_PURCHASED",
      data: {
        assetId: receipt.assetId,
        recipient: receipt.recipient,
        price: receipt.price,
        amountPaid: receipt.amountPaid,
      },
    });

    return receipt;
  }

  private async settlePurchase(
    tx: MarketWriter,
    request: PurchaseRequest,
  ): Promise<PurchaseReceipt> {
    const { assetId } = request;

    // 1. Payout recipient
    const payoutRecipient = await tx.getPayoutRecipient();
    if (!payoutRecipient) throw new PayoutNotConfiguredError();

    // 2. Existence
    const asset = isAssetId(assetId) ? await tx.lockAsset(assetId) : undefined;
    if (!asset) throw new AssetNotFoundError(assetId);

    // 3. Sale state
    if (!asset.forSale) throw new NotForSaleError(assetId);

    // 4. Payment
    const amount = parseAmount(request.amount);
    if (!amount) throw new InvalidAmountError(request.amount);
    if (amount.lessThan(asset.price)) {
      throw new InsufficientPaymentError(asset.price, formatAmount(amount));
    }

    // 5. Destination
    if (!isValidDestination(request.recipient)) {
      throw new InvalidRecipientError(request.recipient);
    }
    const recipient = normalizeAddress(request.recipient);

    let payer = recipient;
    if (request.buyer !== undefined) {
      if (!isValidDestination(request.buyer)) throw new InvalidRecipientError(request.buyer);
      payer = normalizeAddress(request.buyer);
    }

    const amountPaid = formatAmount(amount);

    await tx.markSold(assetId);
    const previousOwner = await this.registry.transferOwnership(tx, assetId, recipient);
    await tx.appendLedgerEntry({
      kind: "PURCHASE_PAYOUT",
      assetId,
      payer,
      destination: payoutRecipient,
      amount: amountPaid,
    });

    await this.forward({ assetId }, payoutRecipient, amountPaid, `purchase:${assetId}`);

    return {
      assetId,
      recipient,
      previousOwner,
      price: asset.price,
      amountPaid,
      payoutRecipient,
    };
  }

  private async reportFailedPurchase(assetId: number, err: unknown): Promise<void> {
    const code = err instanceof MarketError ? err.code : "INTERNAL";
    trackPurchase("failed", code);
    logger.warn({ assetId, code, err }, "Purchase failed");

    if (err instanceof TransferFailedError) {
      await this.events.emit({
        eventType: "PURCHASE_FAILED",
        data: { assetId, reason: err.message },
      });
    }
  }

  // Record funds that reached the engine outside a purchase
  async receiveFunds(from: Address, amount: string | number): Promise<string> {
    this.assertNotSettling("Deposit");

    const value = parseAmount(amount);
    if (!value || value.isZero()) throw new InvalidAmountError(amount);
    if (!isValidDestination(from)) throw new InvalidRecipientError(from);
    const sender = normalizeAddress(from);
    const deposited = formatAmount(value);

    const balance = await this.store.transaction(async (tx) => {
      const next = new Decimal(await tx.getEngineBalance()).plus(value);
      await tx.setEngineBalance(formatAmount(next));
      await tx.appendLedgerEntry({
        kind: "STRAY_DEPOSIT",
        assetId: null,
        payer: sender,
        destination: null,
        amount: deposited,
      });
      return formatAmount(next);
    });

    logger.info({ from: sender, amount: deposited, balance }, "Stray funds received");
    await this.events.emit({
      eventType: "STRAY_FUNDS_RECEIVED",
      data: { from: sender, amount: deposited },
    });
    return balance;
  }

  /**
   * Sweep the engine's stray balance to the payout recipient, or to the
   * administrator while no payout recipient is configured.
   */
  async withdrawStrayFunds(caller: Address | null | undefined): Promise<SweepReceipt> {
    this.registry.requireAdministrator(caller);
    this.assertNotSettling("Withdrawal");

    let receipt: SweepReceipt;
    try {
      receipt = await this.store.transaction(async (tx) => {
        const balance = new Decimal(await tx.getEngineBalance());
        if (balance.isZero()) throw new NothingToWithdrawError();

        const destination = (await tx.getPayoutRecipient()) ?? this.registry.administrator;
        const amount = formatAmount(balance);

        await tx.setEngineBalance("0");
        const entry = await tx.appendLedgerEntry({
          kind: "STRAY_SWEEP",
          assetId: null,
          payer: null,
          destination,
          amount,
        });
        await this.forward({ assetId: null }, destination, amount, `sweep:${entry.id}`);

        return { destination, amount };
      });
    } catch (err) {
      if (err instanceof TransferFailedError) trackSweep("failed");
      throw err;
    }

    trackSweep("success");
    logger.info(receipt, "Stray funds withdrawn");
    await this.events.emit({ eventType: "STRAY_FUNDS_WITHDRAWN", data: receipt });
    return receipt;
  }

  async setPayoutRecipient(
    caller: Address | null | undefined,
    address: Address,
  ): Promise<PayoutRecipientChange> {
    this.registry.requireAdministrator(caller);
    this.assertNotSettling("Payout recipient update");
    if (!isValidDestination(address)) throw new InvalidRecipientError(address);
    const current = normalizeAddress(address);

    const previous = await this.store.transaction(async (tx) => {
      const existing = await tx.getPayoutRecipient();
      await tx.setPayoutRecipient(current);
      return existing;
    });

    logger.info({ previous, current }, "Payout recipient updated");
    await this.events.emit({
      eventType: "PAYOUT_RECIPIENT_UPDATED",
      data: { previous, current },
    });
    return { previous, current };
  }

  async getPayoutRecipient(): Promise<Address | null> {
    return this.store.getPayoutRecipient();
  }

  async getEngineBalance(): Promise<string> {
    return this.store.getEngineBalance();
  }

  async listLedgerEntries(limit: number = 20, offset: number = 0): Promise<LedgerEntry[]> {
    const pageSize = Math.min(Math.max(Math.trunc(limit), 1), MAX_LEDGER_PAGE);
    return this.store.listLedgerEntries(pageSize, Math.max(Math.trunc(offset), 0));
  }

  private assertNotSettling(operation: string): void {
    if (this.settlement.getStore()) {
      throw new ReentrantCallError(operation);
    }
  }

  private async forward(
    settlement: Settlement,
    destination: Address,
    amount: string,
    reference: string,
  ): Promise<void> {
    try {
      await this.settlement.run(settlement, () =>
        this.payable.forward(destination, amount, reference),
      );
    } catch (err) {
      throw new TransferFailedError(destination, err);
    }
  }
}
