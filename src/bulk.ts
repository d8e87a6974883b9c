/**
 * Multi-request helpers: paginated retrieval and per-item bulk updates.
 *
 * Both run strictly one request at a time.
 *
 * @module bulk
 */

import { ResultAsync, type Result } from "neverthrow";

import { MAX_PAGE_SIZE } from "./client.js";
import { RTError } from "./errors.js";
import { PaginatedResponseSchema, type PaginatedResponse } from "./schemas.js";
import type { JsonObject, JsonValue, RecordId } from "./types.js";

export const DEFAULT_MAX_RESULTS = 1000;

export type PageFetcher = (page: number, perPage: number) => Promise<JsonValue>;

export interface RetrievalResult {
  total: number;
  items: JsonObject[];
}

/**
 * Page through a search until `maxResults` items are collected, the last
 * page is reached, or a page comes back empty. Any failed page aborts the
 * whole retrieval.
 */
export async function retrieveAll(
  fetchPage: PageFetcher,
  maxResults = DEFAULT_MAX_RESULTS,
  onPage?: (page: PaginatedResponse, pageNumber: number) => void | Promise<void>
): Promise<RetrievalResult> {
  const items: JsonObject[] = [];
  let total = 0;
  let page = 1;

  while (items.length < maxResults) {
    const response = parsePage(await fetchPage(page, MAX_PAGE_SIZE));
    await onPage?.(response, page);

    items.push(...response.items);
    total = response.total;

    if (page >= response.pages || response.items.length === 0) {
      break;
    }
    page++;
  }

  return { total, items: items.slice(0, Math.max(maxResults, 0)) };
}

function parsePage(raw: JsonValue): PaginatedResponse {
  const parsed = PaginatedResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RTError(
      `Malformed search response: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`
    );
  }
  return parsed.data;
}

export type UpdateFn = (id: RecordId) => Promise<unknown>;

export interface BulkFailure {
  id: RecordId;
  error: string;
}

export interface BulkUpdateResult {
  success: RecordId[];
  failed: BulkFailure[];
}

/**
 * Apply `update` to every id in order. A failing item is recorded and the
 * batch carries on.
 */
export async function bulkUpdate(
  ids: readonly RecordId[],
  update: UpdateFn,
  onItem?: (
    id: RecordId,
    outcome: Result<unknown, Error>,
    index: number
  ) => void | Promise<void>
): Promise<BulkUpdateResult> {
  const result: BulkUpdateResult = { success: [], failed: [] };

  for (const [index, id] of ids.entries()) {
    const outcome = await ResultAsync.fromPromise(update(id), toError);
    await onItem?.(id, outcome, index);

    outcome.match(
      () => {
        result.success.push(id);
      },
      (error) => {
        result.failed.push({ id, error: error.message });
      }
    );
  }

  return result;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
