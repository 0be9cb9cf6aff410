export type MarketErrorCode =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "NOT_FOR_SALE"
  | "INSUFFICIENT_PAYMENT"
  | "INVALID_RECIPIENT"
  | "INVALID_AMOUNT"
  | "PAYOUT_NOT_CONFIGURED"
  | "TRANSFER_FAILED"
  | "NOTHING_TO_WITHDRAW"
  | "REENTRANT_CALL";

export type MarketErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 502;

export class MarketError extends Error {
  constructor(
    message: string,
    readonly code: MarketErrorCode,
    readonly status: MarketErrorStatus,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MarketError";
  }
}

export class UnauthorizedError extends MarketError {
  constructor(message: string = "Caller is not the administrator", status: 401 | 403 = 403) {
    super(message, "UNAUTHORIZED", status);
    this.name = "UnauthorizedError";
  }
}

export class AssetNotFoundError extends MarketError {
  constructor(readonly assetId: number) {
    super(`Asset ${assetId} does not exist`, "NOT_FOUND", 404);
    this.name = "AssetNotFoundError";
  }
}

export class NotForSaleError extends MarketError {
  constructor(readonly assetId: number) {
    super(`Asset ${assetId} is not for sale`, "NOT_FOR_SALE", 409);
    this.name = "NotForSaleError";
  }
}

export class InsufficientPaymentError extends MarketError {
  constructor(
    readonly price: string,
    readonly paid: string,
  ) {
    super(`Payment of ${paid} is below the price of ${price}`, "INSUFFICIENT_PAYMENT", 402);
    this.name = "InsufficientPaymentError";
  }
}

export class InvalidRecipientError extends MarketError {
  constructor(readonly recipient: unknown) {
    super(`Invalid destination address: ${String(recipient)}`, "INVALID_RECIPIENT", 400);
    this.name = "InvalidRecipientError";
  }
}

export class InvalidAmountError extends MarketError {
  constructor(readonly amount: unknown) {
    super(
      `Amount must be a non-negative integer in the smallest currency unit, got ${String(amount)}`,
      "INVALID_AMOUNT",
      400,
    );
    this.name = "InvalidAmountError";
  }
}

export class PayoutNotConfiguredError extends MarketError {
  constructor() {
    super("Payout recipient has not been configured", "PAYOUT_NOT_CONFIGURED", 409);
    this.name = "PayoutNotConfiguredError";
  }
}

export class TransferFailedError extends MarketError {
  constructor(destination: string, cause: unknown) {
    super(`Funds transfer to ${destination} was rejected`, "TRANSFER_FAILED", 502, { cause });
    this.name = "TransferFailedError";
  }
}

export class NothingToWithdrawError extends MarketError {
  constructor() {
    super("Engine holds no stray funds", "NOTHING_TO_WITHDRAW", 409);
    this.name = "NothingToWithdrawError";
  }
}

export class ReentrantCallError extends MarketError {
  constructor(readonly operation: string) {
    super(
      `${operation} attempted while a settlement is in progress`,
      "REENTRANT_CALL",
      409,
    );
    this.name = "ReentrantCallError";
  }
}
