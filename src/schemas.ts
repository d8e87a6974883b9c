/**
 * zod schemas for RT payloads.
 *
 * @module schemas
 */

import { z } from "zod";

import type { JsonObject, JsonValue } from "./types.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), JsonObjectSchema])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.lazy(() => z.record(JsonValueSchema));

/** A value RT accepts for an object field. */
export const FieldValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.union([z.string(), z.number()])),
]);

export const FieldValuesSchema = z.record(FieldValueSchema);

/**
 * One page of an RT collection. Missing metadata falls back to a single,
 * empty page so callers paging through it always terminate.
 */
export const PaginatedResponseSchema = z.object({
  count: z.number().int().nonnegative().optional(),
  page: z.number().int().positive().default(1),
  pages: z.number().int().nonnegative().default(1),
  per_page: z.number().int().positive().optional(),
  total: z.number().int().nonnegative().default(0),
  items: z.array(JsonObjectSchema).default([]),
});

export type PaginatedResponse = z.infer<typeof PaginatedResponseSchema>;
