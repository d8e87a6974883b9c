/**
 * Cross-object search, bulk updates and auto-paginated ticket search.
 *
 * @module tools/search
 */

import { z } from "zod";

import { bulkUpdate as applyToEach, DEFAULT_MAX_RESULTS, retrieveAll } from "../bulk.js";
import type { ResourceKind } from "../client.js";
import { FieldValuesSchema } from "../schemas.js";
import { rtFields } from "../utils.js";
import { recordId, searchArgs } from "./common.js";
import { defineTool } from "./types.js";

export const searchAll = defineTool({
  name: "search_all",
  tags: { area: "search", access: "read", tier: "power-user" },
  description: "Search across all RT object types (tickets, queues, users, assets, etc.)",
  annotations: { title: "Global RT Search", readOnlyHint: true },
  schema: z.object({
    ...searchArgs,
    object_type: z
      .string()
      .optional()
      .describe("Optional object type filter (ticket, queue, user, asset, ...)"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Global search: ${args.query}`);
    return client.searchAll(args.query, args.object_type, args.page, args.per_page);
  },
});

const BULK_TYPES = [
  "ticket",
  "queue",
  "user",
  "group",
  "asset",
  "catalog",
  "customfield",
  "customrole",
] as const satisfies readonly ResourceKind[];

export const bulkUpdate = defineTool({
  name: "bulk_update",
  tags: { area: "search", access: "write", tier: "power-user" },
  description:
    "Apply the same update to multiple objects, one at a time. Failures are reported per object and do not stop the batch.",
  annotations: { title: "Bulk Update RT Objects", readOnlyHint: false },
  schema: z.object({
    object_type: z.enum(BULK_TYPES).describe("Type of object to update"),
    object_ids: z.array(recordId("Object")).min(1).describe("IDs of the objects to update"),
    updates: FieldValuesSchema.describe('RT field/value pairs to set (e.g. {"Status":"resolved"})'),
  }),
  handler: async (args, { client, log, reportProgress }) => {
    const total = args.object_ids.length;
    const fields = rtFields(args.updates);
    log.info(`Starting bulk update of ${total} ${args.object_type}s`);

    const results = await applyToEach(
      args.object_ids,
      (id) => client.update(args.object_type, id, fields),
      async (id, outcome, index) => {
        const message = outcome.match(
          () => `Updated ${args.object_type} ${id}`,
          (error) => `Failed ${args.object_type} ${id}: ${error.message}`
        );
        if (outcome.isOk()) log.debug(message);
        else log.warn(message);
        await reportProgress?.(index + 1, total, message);
      }
    );

    log.info(
      `Bulk update complete: ${results.success.length} success, ${results.failed.length} failed`
    );
    return {
      total,
      success_count: results.success.length,
      failed_count: results.failed.length,
      results,
    };
  },
});

export const advancedTicketSearch = defineTool({
  name: "advanced_ticket_search",
  tags: { area: "search", access: "read", tier: "power-user" },
  description:
    "Ticket search that pages through all results automatically, up to max_results",
  annotations: { title: "Advanced Ticket Search", readOnlyHint: true },
  schema: z.object({
    query: searchArgs.query,
    max_results: z
      .number()
      .int()
      .min(0)
      .default(DEFAULT_MAX_RESULTS)
      .describe("Maximum total results to retrieve (default 1000)"),
  }),
  handler: async (args, { client, log, reportProgress }) => {
    log.info(`Advanced search: ${args.query} (max ${args.max_results} results)`);

    let retrieved = 0;
    const { total, items } = await retrieveAll(
      (page, perPage) => client.searchTickets(args.query, page, perPage),
      args.max_results,
      async (page, pageNumber) => {
        retrieved += page.items.length;
        log.debug(`Retrieved page ${pageNumber}/${page.pages} (${page.items.length} items)`);
        await reportProgress?.(
          Math.min(retrieved, args.max_results),
          args.max_results,
          `Page ${pageNumber}`
        );
      }
    );

    log.info(`Retrieved ${items.length} tickets (total available: ${total})`);
    return {
      query: args.query,
      total_available: total,
      retrieved_count: items.length,
      max_results: args.max_results,
      items,
    };
  },
});

export const tools = [searchAll, bulkUpdate, advancedTicketSearch];
