import { OpenAPIHono, z } from "@hono/zod-openapi";
import type { AppEnv } from "../middlewares/actor";
import { ASSET_CATEGORIES } from "../types";
import type { Asset, LedgerEntry } from "../types";

export const ErrorSchema = z
  .object({
    error: z.string(),
    code: z.string(),
  })
  .openapi("Error");

export const AmountSchema = z
  .union([
    z.string().regex(/^\d+$/, "must be a non-negative integer"),
    z.number().int().nonnegative(),
  ])
  .openapi({ example: "100", description: "Integer amount in the smallest currency unit" });

export const AddressSchema = z
  .string()
  .openapi({ example: "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed" });

export const AssetSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    category: z.enum(ASSET_CATEGORIES),
    price: z.string(),
    metadataRef: z.string(),
    forSale: z.boolean(),
    createdAt: z.string(),
  })
  .openapi("Asset");

export const LedgerEntrySchema = z
  .object({
    id: z.number().int(),
    kind: z.enum(["PURCHASE_PAYOUT", "STRAY_DEPOSIT", "STRAY_SWEEP"]),
    assetId: z.number().int().nullable(),
    payer: z.string().nullable(),
    destination: z.string().nullable(),
    amount: z.string(),
    createdAt: z.string(),
  })
  .openapi("LedgerEntry");

export function serializeAsset(asset: Asset): z.infer<typeof AssetSchema> {
  return { ...asset, createdAt: asset.createdAt.toISOString() };
}

export function serializeLedgerEntry(entry: LedgerEntry): z.infer<typeof LedgerEntrySchema> {
  return { ...entry, createdAt: entry.createdAt.toISOString() };
}

export const errorResponse = (description: string) => ({
  content: { "application/json": { schema: ErrorSchema } },
  description,
});

// Routers answer request validation failures in the same shape as domain errors
export const createRouter = () =>
  new OpenAPIHono<AppEnv>({
    defaultHook: (result, c) => {
      if (!result.success) {
        const error = result.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; ");
        return c.json({ error, code: "VALIDATION_FAILED" }, 400);
      }
    },
  });
