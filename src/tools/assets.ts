/**
 * Asset tools.
 *
 * @module tools/assets
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, numericId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const asset = labels("asset", "asset", "Asset", "asset");
const assetId = numericId("asset");

export const getAsset = defineTool({
  name: "get_asset",
  tags: { area: "assets", access: "read", tier: "basic" },
  description: "Get asset details by ID",
  annotations: { title: "Get RT Asset", readOnlyHint: true },
  schema: z.object({ asset_id: assetId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching asset ${args.asset_id}`);
    return client.retrieve("asset", args.asset_id);
  },
});

export const createAsset = defineTool({
  name: "create_asset",
  tags: { area: "assets", access: "write", tier: "basic" },
  description: "Create a new asset",
  annotations: { title: "Create RT Asset", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Asset name"),
    catalog: z.string().min(1).describe("Catalog name or ID"),
    description: z.string().optional().describe("Asset description"),
    status: z.string().default("allocated").describe("Initial status (default: allocated)"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating asset '${args.name}'`);
    return client.create(
      "asset",
      rtFields({
        Name: args.name,
        Catalog: args.catalog,
        Status: args.status,
        Description: args.description || undefined,
      })
    );
  },
});

export const updateAsset = defineTool({
  name: "update_asset",
  tags: { area: "assets", access: "write", tier: "basic" },
  description: "Update an existing asset",
  annotations: { title: "Update RT Asset", readOnlyHint: false },
  schema: z.object({
    asset_id: assetId,
    name: z.string().optional(),
    description: z.string().optional(),
    status: z.string().optional(),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating asset ${args.asset_id}`);
    return client.update(
      "asset",
      args.asset_id,
      rtFields({
        Name: args.name || undefined,
        Description: args.description || undefined,
        Status: args.status || undefined,
      })
    );
  },
});

export const deleteAsset = defineTool({
  name: "delete_asset",
  tags: { area: "assets", access: "delete", tier: "admin" },
  description: "Delete an asset",
  annotations: { title: "Delete RT Asset", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ asset_id: assetId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting asset ${args.asset_id}`);
    return client.remove("asset", args.asset_id);
  },
});

export const tools = [
  listTool(asset),
  getAsset,
  createAsset,
  updateAsset,
  deleteAsset,
  searchTool(asset),
];
