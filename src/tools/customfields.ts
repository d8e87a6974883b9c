/**
 * Custom field tools.
 *
 * @module tools/customfields
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const customField = labels("customfield", "custom field", "Custom Field", "custom_field");
const fieldId = recordId("Custom field");

export const getCustomField = defineTool({
  name: "get_custom_field",
  tags: { area: "custom-fields", access: "read", tier: "basic" },
  description: "Get custom field details by ID or name",
  annotations: { title: "Get RT Custom Field", readOnlyHint: true },
  schema: z.object({ field_id: fieldId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching custom field ${args.field_id}`);
    return client.retrieve("customfield", args.field_id);
  },
});

export const createCustomField = defineTool({
  name: "create_custom_field",
  tags: { area: "custom-fields", access: "write", tier: "admin" },
  description: "Create a new custom field",
  annotations: { title: "Create RT Custom Field", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Custom field name"),
    type: z
      .string()
      .min(1)
      .describe("Field type (Freeform, Select, Text, Date, DateTime, Binary, ...)"),
    description: z.string().optional(),
    lookup_type: z
      .string()
      .optional()
      .describe("Object type the field applies to (e.g. RT::Queue-RT::Ticket)"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating custom field '${args.name}'`);
    return client.create(
      "customfield",
      rtFields({
        Name: args.name,
        Type: args.type,
        Description: args.description || undefined,
        LookupType: args.lookup_type || undefined,
      })
    );
  },
});

export const updateCustomField = defineTool({
  name: "update_custom_field",
  tags: { area: "custom-fields", access: "write", tier: "admin" },
  description: "Update an existing custom field",
  annotations: { title: "Update RT Custom Field", readOnlyHint: false },
  schema: z.object({
    field_id: fieldId,
    name: z.string().optional(),
    description: z.string().optional(),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating custom field ${args.field_id}`);
    return client.update(
      "customfield",
      args.field_id,
      rtFields({ Name: args.name || undefined, Description: args.description || undefined })
    );
  },
});

export const deleteCustomField = defineTool({
  name: "delete_custom_field",
  tags: { area: "custom-fields", access: "delete", tier: "admin" },
  description: "Delete a custom field",
  annotations: { title: "Delete RT Custom Field", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ field_id: fieldId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting custom field ${args.field_id}`);
    return client.remove("customfield", args.field_id);
  },
});

export const tools = [
  listTool(customField),
  getCustomField,
  createCustomField,
  updateCustomField,
  deleteCustomField,
  searchTool(customField),
];
