/**
 * Custom role tools.
 *
 * @module tools/customroles
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const customRole = labels("customrole", "custom role", "Custom Role", "custom_role", "admin");
const roleId = recordId("Custom role");

export const getCustomRole = defineTool({
  name: "get_custom_role",
  tags: { area: "custom-roles", access: "read", tier: "admin" },
  description: "Get custom role details by ID or name",
  annotations: { title: "Get RT Custom Role", readOnlyHint: true },
  schema: z.object({ role_id: roleId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching custom role ${args.role_id}`);
    return client.retrieve("customrole", args.role_id);
  },
});

export const createCustomRole = defineTool({
  name: "create_custom_role",
  tags: { area: "custom-roles", access: "write", tier: "admin" },
  description: "Create a new custom role",
  annotations: { title: "Create RT Custom Role", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Custom role name"),
    description: z.string().optional(),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating custom role '${args.name}'`);
    return client.create(
      "customrole",
      rtFields({ Name: args.name, Description: args.description || undefined })
    );
  },
});

export const updateCustomRole = defineTool({
  name: "update_custom_role",
  tags: { area: "custom-roles", access: "write", tier: "admin" },
  description: "Update an existing custom role",
  annotations: { title: "Update RT Custom Role", readOnlyHint: false },
  schema: z.object({
    role_id: roleId,
    name: z.string().optional(),
    description: z.string().optional(),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating custom role ${args.role_id}`);
    return client.update(
      "customrole",
      args.role_id,
      rtFields({ Name: args.name || undefined, Description: args.description || undefined })
    );
  },
});

export const deleteCustomRole = defineTool({
  name: "delete_custom_role",
  tags: { area: "custom-roles", access: "delete", tier: "admin" },
  description: "Delete a custom role",
  annotations: { title: "Delete RT Custom Role", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ role_id: roleId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting custom role ${args.role_id}`);
    return client.remove("customrole", args.role_id);
  },
});

export const tools = [
  listTool(customRole),
  getCustomRole,
  createCustomRole,
  updateCustomRole,
  deleteCustomRole,
  searchTool(customRole),
];
