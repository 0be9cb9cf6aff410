import type { Address } from "../types";
import { type Payable, TransferRejectedError } from "./payable";
import { generateSignature } from "../utils/signature";
import { logger } from "../utils/logger";

export interface PayoutGatewayOptions {
  url: string;
  secret?: string;
  timeoutMs?: number;
}

// Posts signed payout instructions to the settlement backend
export class HttpPayoutGateway implements Payable {
  constructor(private readonly options: PayoutGatewayOptions) {}

  async forward(
    destination: Address,
    amount: string,
    reference: string,
  ): Promise<void> {
    const body = JSON.stringify({ destination, amount, reference });
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "X-Payout-Reference": reference,
    };
    if (this.options.secret) {
      headers["X-Payout-Signature"] = await generateSignature(
        body,
        this.options.secret,
      );
    }

    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
      });
    } catch (err) {
      logger.warn({ err, destination, reference }, "Payout gateway unreachable");
      throw new TransferRejectedError(
        `Payout gateway unreachable: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (!response.ok) {
      logger.warn(
        { status: response.status, destination, reference },
        "Payout rejected",
      );
      throw new TransferRejectedError(
        `Payout rejected with status ${response.status}`,
        response.status,
      );
    }

    logger.debug({ destination, amount, reference }, "Payout accepted");
  }
}
