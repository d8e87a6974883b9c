/**
 * Shared utilities for tool handlers.
 *
 * @module utils
 */

import { RTError } from "./errors.js";
import { isJsonObject, type JsonObject, type JsonValue } from "./types.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/**
 * Format a successful tool result as MCP text content.
 */
export function ok(data: unknown): ToolResult {
  const text = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  return { content: [{ type: "text", text }] };
}

/**
 * Format an error tool result as MCP text content.
 */
export function err(message: string): ToolResult & { isError: true } {
  return { content: [{ type: "text", text: `ERROR: ${message}` }], isError: true };
}

/**
 * Safely format an RT error for display.
 */
export function formatError(error: unknown): string {
  if (error instanceof RTError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Build an RT payload from optional fields, dropping undefined values.
 * Booleans become RT's 0/1 flags.
 */
export function rtFields(fields: Record<string, JsonValue | undefined>): JsonObject {
  const payload: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    payload[key] = typeof value === "boolean" ? flag(value) : value;
  }
  return payload;
}

export function flag(value: boolean): 0 | 1 {
  return value ? 1 : 0;
}

/**
 * Read a numeric field from a paginated RT response for log lines.
 */
export function countOf(data: JsonValue, key: "count" | "total"): number {
  if (isJsonObject(data)) {
    const value = data[key];
    if (typeof value === "number") return value;
  }
  return 0;
}
