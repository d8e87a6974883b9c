/**
 * RT REST2 HTTP client — undici-based, one connection agent per client.
 *
 * @module client
 */

import { Agent, FormData, fetch as undiciFetch, type RequestInit, type Response } from "undici";

import { apiBaseUrl, authorizationHeader, type RTConfig } from "./config.js";
import {
  APIError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NetworkError,
  NotFoundError,
  RTError,
  ValidationError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import {
  isJsonObject,
  type HttpMethod,
  type JsonObject,
  type JsonValue,
  type QueryParams,
  type RecordId,
  type RequestDescriptor,
} from "./types.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface RTClientOptions {
  /** Replaces the agent-bound undici fetch (tests). */
  fetch?: FetchFn;
  logger?: Logger;
}

/** Object types with REST2 CRUD endpoints at `/<kind>` and `/<kind>s`. */
export type ResourceKind =
  | "ticket"
  | "queue"
  | "user"
  | "group"
  | "asset"
  | "catalog"
  | "customfield"
  | "customrole"
  | "transaction"
  | "attachment";

export type TicketAction = "take" | "steal" | "untake";

/** RT caps per_page at 100. */
export const MAX_PAGE_SIZE = 100;

export const NOT_MODIFIED_STATUS = "not_modified";

interface Exchange<T> {
  status: number;
  etag: string | null;
  payload: T;
}

export class RTClient {
  readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly agent: Agent;
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;
  private closePromise?: Promise<void>;

  constructor(
    private readonly config: RTConfig,
    options: RTClientOptions = {}
  ) {
    this.baseUrl = apiBaseUrl(config);
    this.authHeader = authorizationHeader(config.auth);
    this.agent = new Agent({ connect: { rejectUnauthorized: config.verifySsl } });
    this.fetchFn =
      options.fetch ?? ((url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }));
    this.log = options.logger ?? createLogger("rt-client", config.logLevel);
  }

  // ── Core HTTP methods ──────────────────────────────────────────

  async request(descriptor: RequestDescriptor): Promise<JsonValue> {
    const { payload } = await this.exchangeJson(descriptor);
    return payload;
  }

  async get(path: string, params?: QueryParams): Promise<JsonValue> {
    return this.request({ method: "GET", path, params });
  }

  async post(path: string, body?: JsonObject): Promise<JsonValue> {
    return this.request({ method: "POST", path, body });
  }

  async put(path: string, body?: JsonObject, headers?: Record<string, string>): Promise<JsonValue> {
    return this.request({ method: "PUT", path, body, headers });
  }

  async delete(path: string): Promise<JsonValue> {
    return this.request({ method: "DELETE", path });
  }

  /**
   * POST a multipart body carrying one named binary part.
   */
  async postMultipart(
    path: string,
    field: string,
    filename: string,
    content: Uint8Array,
    contentType = "application/octet-stream"
  ): Promise<JsonValue> {
    const form = new FormData();
    form.append(field, new Blob([new Uint8Array(content)], { type: contentType }), filename);

    const exchange = await this.send(
      "POST",
      path,
      // fetch sets the multipart boundary itself
      { headers: this.headers(), body: form },
      undefined,
      (response) => response.text()
    );
    return interpretResponse(exchange.status, exchange.payload);
  }

  /**
   * GET raw bytes (attachment content).
   */
  async getRaw(path: string): Promise<{ data: Buffer; contentType: string }> {
    const exchange = await this.send(
      "GET",
      path,
      { headers: { Authorization: this.authHeader, Accept: "*/*" } },
      undefined,
      async (response) => ({
        data: Buffer.from(await response.arrayBuffer()),
        contentType: response.headers.get("content-type") ?? "application/octet-stream",
      })
    );

    if (!isSuccess(exchange.status)) {
      throw errorForStatus(exchange.status, parseBody(exchange.payload.data.toString("utf8")));
    }
    return exchange.payload;
  }

  /**
   * Release the connection agent. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.log.debug("Closing HTTP agent");
      this.closePromise = this.agent.close();
    }
    return this.closePromise;
  }

  // ── Generic resource operations ────────────────────────────────

  async list(kind: ResourceKind): Promise<JsonValue> {
    return this.get(`/${kind}s`);
  }

  async search(
    kind: ResourceKind,
    query: string,
    page = 1,
    perPage = 20
  ): Promise<JsonValue> {
    return this.get(`/${kind}s`, { query, page, per_page: perPage });
  }

  async retrieve(kind: ResourceKind, id: RecordId): Promise<JsonValue> {
    return this.get(`/${kind}/${segment(id)}`);
  }

  async create(kind: ResourceKind, data: JsonObject): Promise<JsonValue> {
    return this.post(`/${kind}`, data);
  }

  /**
   * Update an object. With an etag the write is conditional (If-Match) and a
   * stale token surfaces as ConflictError.
   */
  async update(
    kind: ResourceKind,
    id: RecordId,
    data: JsonObject,
    etag?: string
  ): Promise<JsonValue> {
    return this.put(`/${kind}/${segment(id)}`, data, etag ? { "If-Match": etag } : undefined);
  }

  async remove(kind: ResourceKind, id: RecordId): Promise<JsonValue> {
    return this.delete(`/${kind}/${segment(id)}`);
  }

  async validateConnection(): Promise<void> {
    await this.list("queue");
  }

  async serverInfo(): Promise<JsonValue> {
    return this.get("/");
  }

  async searchAll(
    query: string,
    type: string | undefined,
    page = 1,
    perPage = 20
  ): Promise<JsonValue> {
    return this.get("/search", { query, type, page, per_page: perPage });
  }

  // ── Tickets ────────────────────────────────────────────────────

  /** Ticket with its current ETag, when the server sends one. */
  async getTicket(id: number): Promise<{ ticket: JsonValue; etag: string | null }> {
    const { payload, etag } = await this.exchangeJson({
      method: "GET",
      path: `/ticket/${segment(id)}`,
    });
    return { ticket: payload, etag };
  }

  async searchTickets(query: string, page = 1, perPage = 20): Promise<JsonValue> {
    return this.search("ticket", query, page, perPage);
  }

  async correspond(id: number, data: JsonObject): Promise<JsonValue> {
    return this.post(`/ticket/${segment(id)}/correspond`, data);
  }

  async comment(id: number, data: JsonObject): Promise<JsonValue> {
    return this.post(`/ticket/${segment(id)}/comment`, data);
  }

  async changeOwnership(id: number, action: TicketAction): Promise<JsonValue> {
    return this.put(`/ticket/${segment(id)}/${action}`);
  }

  async ticketHistory(id: number): Promise<JsonValue> {
    return this.get(`/ticket/${segment(id)}/history`);
  }

  async ticketAttachments(id: number): Promise<JsonValue> {
    return this.get(`/ticket/${segment(id)}/attachments`);
  }

  async linkTickets(id: number, links: JsonObject): Promise<JsonValue> {
    return this.post(`/ticket/${segment(id)}/links`, links);
  }

  async mergeTickets(id: number, intoId: number): Promise<JsonValue> {
    return this.post(`/ticket/${segment(id)}/merge`, { Into: intoId });
  }

  async uploadAttachment(
    ticketId: number,
    filename: string,
    content: Uint8Array,
    contentType?: string
  ): Promise<JsonValue> {
    return this.postMultipart(
      `/ticket/${segment(ticketId)}/attach`,
      "attachment",
      filename,
      content,
      contentType
    );
  }

  async getAttachmentContent(id: number): Promise<{ data: Buffer; contentType: string }> {
    return this.getRaw(`/attachment/${segment(id)}/content`);
  }

  // ── Users & groups ─────────────────────────────────────────────

  async currentUser(): Promise<JsonValue> {
    return this.get("/user/current");
  }

  async addGroupMember(groupId: RecordId, userId: RecordId): Promise<JsonValue> {
    return this.post(`/group/${segment(groupId)}/member`, { UserId: userId });
  }

  async removeGroupMember(groupId: RecordId, userId: RecordId): Promise<JsonValue> {
    return this.delete(`/group/${segment(groupId)}/member/${segment(userId)}`);
  }

  // ── Internal helpers ───────────────────────────────────────────

  private headers(extra?: Record<string, string>): Record<string, string> {
    return {
      Authorization: this.authHeader,
      Accept: "application/json",
      ...extra,
    };
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const url = new URL(`${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== "") {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  private async exchangeJson(descriptor: RequestDescriptor): Promise<Exchange<JsonValue>> {
    const hasBody = descriptor.body !== undefined;
    const headers = this.headers(hasBody ? { "Content-Type": "application/json" } : undefined);

    const exchange = await this.send(
      descriptor.method,
      descriptor.path,
      {
        headers: { ...headers, ...descriptor.headers },
        body: hasBody ? JSON.stringify(descriptor.body) : undefined,
      },
      descriptor.params,
      (response) => response.text()
    );

    return { ...exchange, payload: interpretResponse(exchange.status, exchange.payload) };
  }

  /**
   * Perform the call and read the body. Transport failures and timeouts
   * (including while reading) become NetworkError; status mapping is the
   * caller's job.
   */
  private async send<T>(
    method: HttpMethod,
    path: string,
    init: Pick<RequestInit, "headers" | "body">,
    params: QueryParams | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<Exchange<T>> {
    const url = this.buildUrl(path, params);
    this.log.debug(`${method} ${url}`);

    try {
      const response = await this.fetchFn(url, {
        ...init,
        method,
        signal: AbortSignal.timeout(this.config.timeout),
      });
      const payload = await read(response);
      this.log.debug(`${method} ${url} -> ${response.status}`);
      return { status: response.status, etag: response.headers.get("etag"), payload };
    } catch (error) {
      throw toNetworkError(error);
    }
  }
}

/**
 * Run `fn` with a client that is closed on every exit path.
 */
export async function withClient<T>(
  config: RTConfig,
  fn: (client: RTClient) => Promise<T>,
  options?: RTClientOptions
): Promise<T> {
  const client = new RTClient(config, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/**
 * Map a status and raw body to data, or throw the matching RTError.
 */
export function interpretResponse(status: number, text: string): JsonValue {
  if (status === 304) {
    return { _status: NOT_MODIFIED_STATUS };
  }
  if (isSuccess(status)) {
    return text === "" ? {} : parseBody(text);
  }
  throw errorForStatus(status, parseBody(text));
}

export function errorForStatus(status: number, body: JsonValue): RTError {
  const message = messageOf(body);
  switch (status) {
    case 401:
      return new AuthenticationError(`Authentication failed: ${message ?? ""}`);
    case 403:
      return new AuthorizationError(`Permission denied: ${message ?? ""}`);
    case 404:
      return new NotFoundError(`Resource not found: ${message ?? ""}`);
    case 409:
    case 412:
      return new ConflictError(`Conflict: ${message ?? ""}`);
    case 422:
      return new ValidationError(`Validation error: ${message ?? ""}`);
    default:
      return new APIError(status, message ?? "Unknown error", body);
  }
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseBody(text: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return { message: text };
  }
}

function messageOf(body: JsonValue): string | undefined {
  if (isJsonObject(body) && typeof body.message === "string" && body.message !== "") {
    return body.message;
  }
  return undefined;
}

function toNetworkError(error: unknown): NetworkError {
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new NetworkError("Request timeout", true);
  }
  const detail = error instanceof Error ? describeCause(error) : String(error);
  return new NetworkError(`Network error: ${detail}`);
}

// undici reports "fetch failed" with the socket error as the cause
function describeCause(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message} (${cause.message})`;
  }
  return error.message;
}

function segment(id: RecordId): string {
  return encodeURIComponent(String(id));
}
