/**
 * Tool declaration and the argument decoder shared by every tool.
 *
 * @module tools/types
 */

import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { RTClient } from "../client.js";
import type { RTConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { err, formatError, ok, type ToolResult } from "../utils.js";

/**
 * Sends an MCP progress notification for the current call. A no-op when the
 * caller did not ask for progress.
 */
export type ProgressReporter = (progress: number, total: number, message?: string) => Promise<void>;

export interface ToolContext {
  client: RTClient;
  config: RTConfig;
  log: Logger;
  reportProgress?: ProgressReporter;
}

export type ToolAccess = "read" | "write" | "delete" | "search";

/** Minimum RT role a tool is meant for. */
export type ToolTier = "basic" | "power-user" | "admin";

export interface ToolTags {
  area: string;
  access: ToolAccess;
  tier: ToolTier;
}

export interface ToolAnnotations {
  title: string;
  readOnlyHint: boolean;
  destructiveHint?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: { type: "object"; [key: string]: unknown };
  annotations: ToolAnnotations;
  /** Filterable tags, e.g. `["tickets", "write", "basic"]`. */
  _meta: { tags: string[] };
}

export interface ToolModule {
  definition: ToolDefinition;
  invoke(rawArgs: unknown, ctx: ToolContext): Promise<ToolResult>;
}

export interface ToolOptions<S extends z.ZodTypeAny> {
  name: string;
  tags: ToolTags;
  description: string;
  annotations: ToolAnnotations;
  schema: S;
  handler: (args: z.output<S>, ctx: ToolContext) => Promise<unknown>;
}

export type Decoded<T> = { success: true; data: T } | { success: false; message: string };

/**
 * Validate raw tool arguments. Keys the schema does not declare are dropped.
 */
export function decodeArguments<S extends z.ZodTypeAny>(
  schema: S,
  rawArgs: unknown
): Decoded<z.output<S>> {
  const parsed = schema.safeParse(rawArgs ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join(", ");
    return { success: false, message };
  }
  return { success: true, data: parsed.data };
}

/**
 * Declare a tool. Handler failures are logged once and re-thrown unchanged.
 */
export function defineTool<S extends z.ZodTypeAny>(options: ToolOptions<S>): ToolModule {
  return {
    definition: {
      name: options.name,
      description: options.description,
      inputSchema: toInputSchema(options.schema),
      annotations: options.annotations,
      _meta: { tags: [options.tags.area, options.tags.access, options.tags.tier] },
    },

    async invoke(rawArgs, ctx) {
      const decoded = decodeArguments(options.schema, rawArgs);
      if (!decoded.success) {
        return err(`Invalid arguments: ${decoded.message}`);
      }

      try {
        return ok(await options.handler(decoded.data, ctx));
      } catch (error) {
        ctx.log.error(`${options.name} failed: ${formatError(error)}`);
        throw error;
      }
    },
  };
}

function toInputSchema(schema: z.ZodTypeAny): ToolDefinition["inputSchema"] {
  const json = zodToJsonSchema(schema, { $refStrategy: "none", target: "jsonSchema7" });
  return { ...json, type: "object" };
}
