/**
 * End-to-end tests: an MCP client talks to the server in process while RT
 * responses come from a mocked fetch.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Progress } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createServer, SERVER_NAME } from "../src/server.js";
import { createToolContext, jsonResponse, mockFetch } from "./helpers.js";

function itemsFrom(first: number, count: number) {
  return Array.from({ length: count }, (_, i) => ({ id: first + i }));
}

describe("RT MCP server", () => {
  let fetch: ReturnType<typeof mockFetch>;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  beforeEach(async () => {
    fetch = mockFetch();
    const { ctx } = createToolContext(fetch);
    const server = createServer(ctx);
    client = new Client({ name: "test-client", version: "1.0.0" });

    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await clientTransport.close();
    await serverTransport.close();
  });

  it("identifies itself", () => {
    expect(client.getServerVersion()).toMatchObject({ name: SERVER_NAME });
  });

  it("lists tools with annotations", async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(72);
    expect(tools.find((t) => t.name === "steal_ticket")?._meta).toEqual({
      tags: ["tickets", "write", "power-user"],
    });
    expect(tools.find((t) => t.name === "delete_ticket")?.annotations).toEqual({
      title: "Delete RT Ticket",
      readOnlyHint: false,
      destructiveHint: true,
    });
  });

  it("calls a tool", async () => {
    fetch.mockResolvedValueOnce(jsonResponse({ id: 1, Name: "General" }));

    const result = await client.callTool({ name: "get_queue", arguments: { queue_id: "General" } });

    expect(fetch.mock.calls[0][0]).toBe("https://rt.example.com/REST/2.0/queue/General");
    expect(result).toMatchObject({
      content: [{ type: "text", text: JSON.stringify({ id: 1, Name: "General" }, null, 2) }],
    });
  });

  it("returns RT failures as error results", async () => {
    fetch.mockResolvedValueOnce(jsonResponse({ message: "Invalid token" }, 401));

    const result = await client.callTool({ name: "get_current_user", arguments: {} });

    expect(result).toMatchObject({
      content: [
        { type: "text", text: "ERROR: AuthenticationError: Authentication failed: Invalid token" },
      ],
      isError: true,
    });
  });

  it("streams bulk update progress to the caller", async () => {
    fetch
      .mockResolvedValueOnce(jsonResponse(["ok"]))
      .mockResolvedValueOnce(jsonResponse({ message: "No ticket 2" }, 404))
      .mockResolvedValueOnce(jsonResponse(["ok"]));
    const progress: Progress[] = [];

    await client.callTool(
      {
        name: "bulk_update",
        arguments: { object_type: "ticket", object_ids: [1, 2, 3], updates: { Status: "resolved" } },
      },
      undefined,
      { onprogress: (p) => progress.push(p) }
    );

    expect(progress).toEqual([
      { progress: 1, total: 3, message: "Updated ticket 1" },
      { progress: 2, total: 3, message: "Failed ticket 2: Resource not found: No ticket 2" },
      { progress: 3, total: 3, message: "Updated ticket 3" },
    ]);
  });

  it("streams search progress per page", async () => {
    fetch
      .mockResolvedValueOnce(jsonResponse({ page: 1, pages: 2, total: 150, items: itemsFrom(1, 100) }))
      .mockResolvedValueOnce(jsonResponse({ page: 2, pages: 2, total: 150, items: itemsFrom(101, 50) }));
    const progress: Progress[] = [];

    await client.callTool(
      { name: "advanced_ticket_search", arguments: { query: "Status = 'open'", max_results: 120 } },
      undefined,
      { onprogress: (p) => progress.push(p) }
    );

    expect(progress).toEqual([
      { progress: 100, total: 120, message: "Page 1" },
      { progress: 120, total: 120, message: "Page 2" },
    ]);
  });

  it("sends no progress unless asked", async () => {
    fetch.mockResolvedValueOnce(jsonResponse(["ok"]));
    const notifications: string[] = [];
    client.fallbackNotificationHandler = async (notification) => {
      notifications.push(notification.method);
    };

    await client.callTool({
      name: "bulk_update",
      arguments: { object_type: "ticket", object_ids: [1], updates: { Status: "open" } },
    });

    expect(notifications).toEqual([]);
  });

  it("lists resources", async () => {
    const { resources } = await client.listResources();

    expect(resources.map((r) => r.uri)).toEqual([
      "rt://queues/list",
      "rt://custom-fields/list",
      "rt://user/current",
      "rt://server/info",
    ]);
  });

  it("reads a resource", async () => {
    fetch.mockResolvedValueOnce(jsonResponse({ Name: "root" }));

    const result = await client.readResource({ uri: "rt://user/current" });

    expect(fetch.mock.calls[0][0]).toBe("https://rt.example.com/REST/2.0/user/current");
    expect(result.contents).toEqual([
      {
        uri: "rt://user/current",
        mimeType: "application/json",
        text: JSON.stringify({ Name: "root" }, null, 2),
      },
    ]);
  });

  it("renders a failed resource read as an error document", async () => {
    fetch.mockResolvedValueOnce(jsonResponse({ message: "Forbidden" }, 403));

    const result = await client.readResource({ uri: "rt://server/info" });

    expect(result.contents).toEqual([
      {
        uri: "rt://server/info",
        mimeType: "application/json",
        text: JSON.stringify(
          { error: "AuthorizationError: Permission denied: Forbidden" },
          null,
          2
        ),
      },
    ]);
  });

  it("rejects an unknown resource", async () => {
    await expect(client.readResource({ uri: "rt://nope" })).rejects.toThrow(
      "Unknown resource: rt://nope"
    );
  });
});
