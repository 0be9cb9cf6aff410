import type { Address } from "../types";

/**
 * Outbound funds capability the exchange settles through.
 *
 * `forward` resolves once the destination has accepted `amount` and rejects
 * if it refused it. The engine treats any rejection as a failed transfer and
 * rolls the surrounding transaction back.
 */
export interface Payable {
  forward(destination: Address, amount: string, reference: string): Promise<void>;
}

export class TransferRejectedError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "TransferRejectedError";
  }
}
