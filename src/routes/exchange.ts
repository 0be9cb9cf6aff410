import { createRoute, z } from "@hono/zod-openapi";
import type { ExchangeEngine } from "../services/exchange.service";
import { MAX_LEDGER_PAGE } from "../services/exchange.service";
import {
  AddressSchema,
  AmountSchema,
  createRouter,
  errorResponse,
  LedgerEntrySchema,
  serializeLedgerEntry,
} from "./schemas";

export function createExchangeRoutes(exchange: ExchangeEngine) {
  const exchangeRoutes = createRouter();

  exchangeRoutes.openapi(
    createRoute({
      method: "post",
      path: "/purchase",
      request: {
        body: {
          required: true,
          content: {
            "application/json": {
              schema: z.object({
                assetId: z.number().int().openapi({ example: 1 }),
                recipient: AddressSchema,
                amount: AmountSchema,
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
                assetId: z.number().int(),
                recipient: z.string(),
                previousOwner: z.string(),
                price: z.string(),
                amountPaid: z.string(),
                payoutRecipient: z.string(),
              }),
            },
          },
          description: "Asset sold and payment forwarded",
        },
        400: errorResponse("Bad request or invalid recipient"),
        402: errorResponse("Payment below the asset price"),
        404: errorResponse("Asset not found"),
        409: errorResponse("Asset not for sale or payout recipient not configured"),
        502: errorResponse("Payment forwarding rejected"),
      },
    }),
    async (c) => {
      const { assetId, recipient, amount } = c.req.valid("json");
      const buyer = c.get("actor") ?? undefined;
      const receipt = await exchange.purchase({ assetId, recipient, amount, buyer });
      return c.json(receipt, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "get",
      path: "/payout-recipient",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ payoutRecipient: z.string().nullable() }),
            },
          },
          description: "Current payout recipient, null until configured",
        },
      },
    }),
    async (c) => {
      const payoutRecipient = await exchange.getPayoutRecipient();
      return c.json({ payoutRecipient }, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "put",
      path: "/payout-recipient",
      request: {
        body: {
          required: true,
          content: {
            "application/json": {
              schema: z.object({ address: AddressSchema }),
            },
          },
        },
      },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({
                previous: z.string().nullable(),
                current: z.string(),
              }),
            },
          },
          description: "Payout recipient updated",
        },
        400: errorResponse("Invalid address"),
        401: errorResponse("Unauthenticated"),
        403: errorResponse("Caller is not the administrator"),
      },
    }),
    async (c) => {
      const { address } = c.req.valid("json");
      const change = await exchange.setPayoutRecipient(c.get("actor"), address);
      return c.json(change, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "get",
      path: "/balance",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ balance: z.string() }),
            },
          },
          description: "Stray funds held by the engine",
        },
      },
    }),
    async (c) => {
      const balance = await exchange.getEngineBalance();
      return c.json({ balance }, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "post",
      path: "/deposits",
      request: {
        body: {
          required: true,
          content: {
            "application/json": {
              schema: z.object({ from: AddressSchema, amount: AmountSchema }),
            },
          },
        },
      },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ balance: z.string() }),
            },
          },
          description: "Funds credited to the engine balance",
        },
        400: errorResponse("Bad request"),
      },
    }),
    async (c) => {
      const { from, amount } = c.req.valid("json");
      const balance = await exchange.receiveFunds(from, amount);
      return c.json({ balance }, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "post",
      path: "/withdraw",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ destination: z.string(), amount: z.string() }),
            },
          },
          description: "Stray funds swept",
        },
        401: errorResponse("Unauthenticated"),
        403: errorResponse("Caller is not the administrator"),
        409: errorResponse("Nothing to withdraw"),
        502: errorResponse("Sweep destination rejected the funds"),
      },
    }),
    async (c) => {
      const receipt = await exchange.withdrawStrayFunds(c.get("actor"));
      return c.json(receipt, 200);
    },
  );

  exchangeRoutes.openapi(
    createRoute({
      method: "get",
      path: "/ledger",
      request: {
        query: z.object({
          limit: z.coerce.number().int().min(1).max(MAX_LEDGER_PAGE).default(20),
          offset: z.coerce.number().int().min(0).default(0),
        }),
      },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ entries: z.array(LedgerEntrySchema) }),
            },
          },
          description: "Funds movements, newest first",
        },
        400: errorResponse("Bad request"),
      },
    }),
    async (c) => {
      const { limit, offset } = c.req.valid("query");
      const entries = await exchange.listLedgerEntries(limit, offset);
      return c.json({ entries: entries.map(serializeLedgerEntry) }, 200);
    },
  );

  return exchangeRoutes;
}
