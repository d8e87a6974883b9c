/**
 * Argument schemas and tool factories shared across resource types.
 *
 * @module tools/common
 */

import { z } from "zod";

import type { ResourceKind } from "../client.js";
import { countOf } from "../utils.js";
import { defineTool, type ToolModule, type ToolTier } from "./types.js";

export const numericId = (what: string) =>
  z.number().int().positive().describe(`Numeric ${what} ID`);

export const recordId = (what: string) =>
  z
    .union([z.string().min(1), z.number().int().positive()])
    .describe(`${what} ID or name`);

export const searchArgs = {
  query: z.string().min(1).describe("RT query string (e.g. \"Status = 'new' AND Queue = 'General'\")"),
  page: z.number().int().positive().default(1).describe("Page number (1-indexed)"),
  per_page: z.number().int().min(1).max(100).default(20).describe("Items per page (max 100)"),
};

interface Labels {
  kind: ResourceKind;
  /** Singular, human readable ("custom field"). */
  noun: string;
  /** Title case, used in annotations ("Custom Field"). */
  title: string;
  /** Tool name stem ("custom_field"). */
  stem: string;
  /** Tag grouping every tool of the resource ("custom-fields"). */
  area: string;
  /** Tier required to list and search. */
  tier: ToolTier;
}

export function listTool({ kind, noun, title, stem, area, tier }: Labels): ToolModule {
  return defineTool({
    name: `list_${stem}s`,
    tags: { area, access: "read", tier },
    description: `List all ${noun}s in RT`,
    annotations: { title: `List RT ${title}s`, readOnlyHint: true },
    schema: z.object({}),
    handler: async (_args, { client, log }) => {
      log.info(`Fetching ${noun} list`);
      const result = await client.list(kind);
      log.info(`Retrieved ${countOf(result, "count")} ${noun}s`);
      return result;
    },
  });
}

export function searchTool({ kind, noun, title, stem, area, tier }: Labels): ToolModule {
  return defineTool({
    name: `search_${stem}s`,
    tags: { area, access: "search", tier },
    description: `Search ${noun}s with RT query syntax`,
    annotations: { title: `Search RT ${title}s`, readOnlyHint: true },
    schema: z.object(searchArgs),
    handler: async (args, { client, log }) => {
      log.info(`Searching ${noun}s: ${args.query}`);
      const result = await client.search(kind, args.query, args.page, args.per_page);
      log.info(
        `Found ${countOf(result, "total")} ${noun}s, showing ${countOf(result, "count")} on page ${args.page}`
      );
      return result;
    },
  });
}

export function labels(
  kind: ResourceKind,
  noun: string,
  title: string,
  stem: string,
  tier: ToolTier = "basic"
): Labels {
  return { kind, noun, title, stem, area: `${stem.replace(/_/g, "-")}s`, tier };
}
