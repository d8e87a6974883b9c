/**
 * Asset catalog tools.
 *
 * @module tools/catalogs
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const catalog = labels("catalog", "catalog", "Catalog", "catalog");
const catalogId = recordId("Catalog");

export const getCatalog = defineTool({
  name: "get_catalog",
  tags: { area: "catalogs", access: "read", tier: "basic" },
  description: "Get catalog details by ID or name",
  annotations: { title: "Get RT Catalog", readOnlyHint: true },
  schema: z.object({ catalog_id: catalogId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching catalog ${args.catalog_id}`);
    return client.retrieve("catalog", args.catalog_id);
  },
});

export const createCatalog = defineTool({
  name: "create_catalog",
  tags: { area: "catalogs", access: "write", tier: "admin" },
  description: "Create a new asset catalog",
  annotations: { title: "Create RT Catalog", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Catalog name"),
    description: z.string().optional(),
    disabled: z.boolean().default(false),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating catalog '${args.name}'`);
    return client.create(
      "catalog",
      rtFields({
        Name: args.name,
        Disabled: args.disabled,
        Description: args.description || undefined,
      })
    );
  },
});

export const updateCatalog = defineTool({
  name: "update_catalog",
  tags: { area: "catalogs", access: "write", tier: "admin" },
  description: "Update an existing catalog",
  annotations: { title: "Update RT Catalog", readOnlyHint: false },
  schema: z.object({
    catalog_id: catalogId,
    name: z.string().optional(),
    description: z.string().optional(),
    disabled: z.boolean().optional(),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating catalog ${args.catalog_id}`);
    return client.update(
      "catalog",
      args.catalog_id,
      rtFields({
        Name: args.name || undefined,
        Description: args.description || undefined,
        Disabled: args.disabled,
      })
    );
  },
});

export const deleteCatalog = defineTool({
  name: "delete_catalog",
  tags: { area: "catalogs", access: "delete", tier: "admin" },
  description: "Delete a catalog",
  annotations: { title: "Delete RT Catalog", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ catalog_id: catalogId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting catalog ${args.catalog_id}`);
    return client.remove("catalog", args.catalog_id);
  },
});

export const tools = [
  listTool(catalog),
  getCatalog,
  createCatalog,
  updateCatalog,
  deleteCatalog,
  searchTool(catalog),
];
