import { randomUUID } from "node:crypto";
import { createRoute, z } from "@hono/zod-openapi";
import {
  MARKET_EVENT_TYPES,
  type MarketEventEmitter,
  type WebhookSubscription,
} from "../events/eventEmitter";
import { createRouter, errorResponse } from "./schemas";

const eventTypeEnum = z.enum(MARKET_EVENT_TYPES);

export function createWebhookRoutes(events: MarketEventEmitter) {
  const webhookRoutes = createRouter();

  webhookRoutes.openapi(
    createRoute({
      method: "post",
      path: "/register",
      request: {
        body: {
          required: true,
          content: {
            "application/json": {
              schema: z.object({
                url: z.string().url(),
                eventTypes: z.array(eventTypeEnum).min(1),
                secret: z.string().optional(),
              }),
            },
          },
        },
      },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({
                subscriptionId: z.string(),
                message: z.string(),
              }),
            },
          },
          description: "Webhook registered successfully",
        },
        400: errorResponse("Bad request"),
      },
    }),
    async (c) => {
      const body = c.req.valid("json");

      const subscription: WebhookSubscription = {
        id: randomUUID(),
        url: body.url,
        eventTypes: body.eventTypes,
        secret: body.secret,
        active: true,
        createdAt: new Date(),
      };

      events.subscribe(subscription);

      return c.json(
        {
          subscriptionId: subscription.id,
          message: "Webhook registered successfully",
        },
        200,
      );
    },
  );

  webhookRoutes.openapi(
    createRoute({
      method: "delete",
      path: "/{subscriptionId}",
      request: {
        params: z.object({
          subscriptionId: z
            .string()
            .openapi({ param: { name: "subscriptionId", in: "path" } }),
        }),
      },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ message: z.string() }),
            },
          },
          description: "Webhook unregistered",
        },
        404: errorResponse("Unknown subscription"),
      },
    }),
    async (c) => {
      const { subscriptionId } = c.req.valid("param");
      if (!events.unsubscribe(subscriptionId)) {
        return c.json(
          { error: `Unknown subscription ${subscriptionId}`, code: "NOT_FOUND" },
          404,
        );
      }
      return c.json({ message: "Webhook unregistered successfully" }, 200);
    },
  );

  webhookRoutes.openapi(
    createRoute({
      method: "get",
      path: "/list",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({
                subscriptions: z.array(
                  z.object({
                    id: z.string(),
                    url: z.string(),
                    eventTypes: z.array(eventTypeEnum),
                    active: z.boolean(),
                  }),
                ),
              }),
            },
          },
          description: "List of all webhooks",
        },
      },
    }),
    async (c) => {
      const subscriptions = events.listSubscriptions().map((sub) => ({
        id: sub.id,
        url: sub.url,
        eventTypes: sub.eventTypes,
        active: sub.active,
      }));
      return c.json({ subscriptions }, 200);
    },
  );

  webhookRoutes.openapi(
    createRoute({
      method: "get",
      path: "/events",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({
                events: z.array(
                  z.object({
                    eventId: z.string(),
                    eventType: eventTypeEnum,
                    timestamp: z.string(),
                    data: z.record(z.union([z.string(), z.number(), z.null()])),
                  }),
                ),
              }),
            },
          },
          description: "Recent event history",
        },
      },
    }),
    async (c) => {
      const history = events.getHistory(100);

      return c.json(
        {
          events: history.map((event) => ({
            eventId: event.eventId,
            eventType: event.eventType,
            timestamp: event.timestamp.toISOString(),
            data: { ...event.data },
          })),
        },
        200,
      );
    },
  );

  return webhookRoutes;
}
