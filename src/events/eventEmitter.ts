// Marketplace business events
// Kept in a bounded history and pushed to webhook subscribers

import { randomUUID } from "node:crypto";
import type { Address, AssetCategory } from "../types";
import { generateSignature } from "../utils/signature";
import { logger } from "../utils/logger";

export const MARKET_EVENT_TYPES = [
  "ASSET_CREATED",
  "ASSET_PURCHASED",
  "PAYOUT_RECIPIENT_UPDATED",
  "STRAY_FUNDS_RECEIVED",
  "STRAY_FUNDS_WITHDRAWN",
  "PURCHASE_FAILED",
] as const;

export type MarketEventType = (typeof MARKET_EVENT_TYPES)[number];

export interface MarketEventPayloads {
  ASSET_CREATED: {
    assetId: number;
    name: string;
    category: AssetCategory;
    price: string;
  };
  ASSET_PURCHASED: {
    assetId: number;
    recipient: Address;
    price: string;
    amountPaid: string;
  };
  PAYOUT_RECIPIENT_UPDATED: { previous: Address | null; current: Address };
  STRAY_FUNDS_RECEIVED: { from: Address; amount: string };
  STRAY_FUNDS_WITHDRAWN: { destination: Address; amount: string };
  PURCHASE_FAILED: { assetId: number; reason: string };
}

export type MarketEventInput = {
  [K in MarketEventType]: { eventType: K; data: MarketEventPayloads[K] };
}[MarketEventType];

export type MarketEvent = MarketEventInput & {
  eventId: string;
  timestamp: Date;
};

export interface WebhookSubscription {
  id: string;
  url: string;
  eventTypes: MarketEventType[];
  secret?: string;
  active: boolean;
  createdAt: Date;
}

export class MarketEventEmitter {
  private subscribers: Map<MarketEventType, WebhookSubscription[]> = new Map();
  private eventHistory: MarketEvent[] = [];

  constructor(
    private readonly maxHistorySize: number = 1000,
    private readonly webhookTimeoutMs: number = 5000,
  ) {}

  subscribe(subscription: WebhookSubscription): void {
    for (const eventType of subscription.eventTypes) {
      const subs = this.subscribers.get(eventType) ?? [];
      subs.push(subscription);
      this.subscribers.set(eventType, subs);
    }
    logger.info(
      { url: subscription.url, eventTypes: subscription.eventTypes },
      "Webhook subscribed",
    );
  }

  unsubscribe(subscriptionId: string): boolean {
    let removed = false;
    for (const [eventType, subs] of this.subscribers.entries()) {
      const filtered = subs.filter((sub) => sub.id !== subscriptionId);
      removed ||= filtered.length !== subs.length;
      this.subscribers.set(eventType, filtered);
    }
    logger.info({ subscriptionId, removed }, "Webhook unsubscribed");
    return removed;
  }

  async emit(input: MarketEventInput): Promise<MarketEvent> {
    const event: MarketEvent = {
      ...input,
      eventId: randomUUID(),
      timestamp: new Date(),
    };

    this.eventHistory.push(event);
    if (this.eventHistory.length > this.maxHistorySize) {
      this.eventHistory.shift();
    }

    logger.info({ eventType: event.eventType, data: event.data }, "Event emitted");

    const deliveries = (this.subscribers.get(event.eventType) ?? [])
      .filter((sub) => sub.active)
      .map((sub) => this.sendWebhook(sub, event));

    await Promise.allSettled(deliveries);
    return event;
  }

  private async sendWebhook(
    subscription: WebhookSubscription,
    event: MarketEvent,
  ): Promise<void> {
    try {
      const body = JSON.stringify({
        eventId: event.eventId,
        eventType: event.eventType,
        timestamp: event.timestamp.toISOString(),
        data: event.data,
      });

      const headers: Record<string, string> = {
        "Content-Type": "application/json",
        "X-Event-Type": event.eventType,
        "X-Event-ID": event.eventId,
      };

      if (subscription.secret) {
        headers["X-Webhook-Signature"] = await generateSignature(
          body,
          subscription.secret,
        );
      }

      const response = await fetch(subscription.url, {
        method: "POST",
        headers,
        body,
        signal: AbortSignal.timeout(this.webhookTimeoutMs),
      });

      if (!response.ok) {
        throw new Error(`Webhook failed: ${response.status}`);
      }

      logger.debug(
        { url: subscription.url, eventType: event.eventType },
        "Webhook delivered",
      );
    } catch (err) {
      logger.error(
        { err, url: subscription.url, eventType: event.eventType },
        "Webhook delivery failed",
      );
    }
  }

  getHistory(limit: number = 100): MarketEvent[] {
    return this.eventHistory.slice(-limit);
  }

  listSubscriptions(): WebhookSubscription[] {
    const unique = new Map<string, WebhookSubscription>();
    for (const subs of this.subscribers.values()) {
      for (const sub of subs) unique.set(sub.id, sub);
    }
    return [...unique.values()];
  }
}

// Process-wide default instance
export const eventEmitter = new MarketEventEmitter();
