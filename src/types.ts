/**
 * Shared value types for RT REST2 payloads.
 *
 * @module types
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Numeric id or name (queues, users, groups and catalogs accept names). */
export type RecordId = string | number;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryParams = Record<string, string | number | undefined>;

export interface RequestDescriptor {
  method: HttpMethod;
  path: string;
  body?: JsonObject;
  headers?: Record<string, string>;
  params?: QueryParams;
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
