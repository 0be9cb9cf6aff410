import { createRoute, z } from "@hono/zod-openapi";
import type { AssetRegistry } from "../services/registry.service";
import { ASSET_CATEGORIES } from "../types";
import {
  AddressSchema,
  AmountSchema,
  AssetSchema,
  createRouter,
  errorResponse,
  serializeAsset,
} from "./schemas";

const AssetIdParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/, "must be a positive integer")
    .openapi({ param: { name: "id", in: "path" }, example: "1" }),
});

export function createAssetRoutes(registry: AssetRegistry) {
  const assetRoutes = createRouter();

  assetRoutes.openapi(
    createRoute({
      method: "post",
      path: "/",
      request: {
        body: {
          required: true,
          content: {
            "application/json": {
              schema: z.object({
                name: z.string().min(1).max(200).openapi({ example: "Dragon Skin" }),
                description: z.string().max(2000),
                category: z.enum(ASSET_CATEGORIES),
                price: AmountSchema,
                metadataRef: z.string().max(2000).openapi({ example: "ipfs://metadata/1.json" }),
                initialHolder: AddressSchema.optional(),
              }),
            },
          },
        },
      },
      responses: {
        201: {
          content: {
            "application/json": {
              schema: z.object({ asset: AssetSchema }),
            },
          },
          description: "Asset minted and listed for sale",
        },
        400: errorResponse("Bad request"),
        401: errorResponse("Unauthenticated"),
        403: errorResponse("Caller is not the administrator"),
      },
    }),
    async (c) => {
      const body = c.req.valid("json");
      const asset = await registry.createAsset(c.get("actor"), body);
      return c.json({ asset: serializeAsset(asset) }, 201);
    },
  );

  assetRoutes.openapi(
    createRoute({
      method: "get",
      path: "/available",
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ assetIds: z.array(z.number().int()) }),
            },
          },
          description: "Ids of every asset for sale, ascending",
        },
      },
    }),
    async (c) => {
      const assetIds = await registry.listAvailable();
      return c.json({ assetIds }, 200);
    },
  );

  assetRoutes.openapi(
    createRoute({
      method: "get",
      path: "/{id}",
      request: { params: AssetIdParamSchema },
      responses: {
        200: {
          content: {
            "application/json": {
              schema: z.object({ asset: AssetSchema, owner: z.string() }),
            },
          },
          description: "Asset details and current owner",
        },
        400: errorResponse("Bad request"),
        404: errorResponse("Asset not found"),
      },
    }),
    async (c) => {
      const id = Number(c.req.valid("param").id);
      const asset = await registry.getAssetDetails(id);
      const owner = await registry.ownerOf(id);
      return c.json({ asset: serializeAsset(asset), owner }, 200);
    },
  );

  return assetRoutes;
}
