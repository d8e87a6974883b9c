import { FormData } from "undici";
import { describe, expect, it } from "vitest";

import { NotFoundError } from "../src/errors.js";
import { getTicket } from "../src/tools/tickets.js";
import { executeTool, getToolDefinitions } from "../src/tools/index.js";
import type { ToolResult } from "../src/utils.js";
import { createToolContext, jsonResponse, mockFetch } from "./helpers.js";

function textOf(result: ToolResult): string {
  return result.content[0].text;
}

function jsonOf(result: ToolResult): unknown {
  return JSON.parse(textOf(result));
}

describe("tool registry", () => {
  it("exposes every tool once with an object input schema", () => {
    const definitions = getToolDefinitions();
    const names = definitions.map((d) => d.name);

    expect(definitions).toHaveLength(72);
    expect(new Set(names).size).toBe(names.length);
    for (const definition of definitions) {
      expect(definition.inputSchema.type).toBe("object");
    }
    expect(names).toEqual(
      expect.arrayContaining([
        "create_ticket",
        "list_custom_fields",
        "search_custom_roles",
        "bulk_update",
        "advanced_ticket_search",
        "upload_attachment",
      ])
    );
  });

  it("describes arguments in the input schema", () => {
    const definition = getToolDefinitions().find((d) => d.name === "get_ticket");

    expect(definition?.inputSchema).toMatchObject({
      type: "object",
      properties: { ticket_id: { type: "integer", description: "Numeric ticket ID" } },
      required: ["ticket_id"],
    });
  });

  it("tags tools by area, access and tier", () => {
    const tagsOf = (name: string) =>
      getToolDefinitions().find((d) => d.name === name)?._meta.tags;

    expect(tagsOf("get_ticket")).toEqual(["tickets", "read", "basic"]);
    expect(tagsOf("merge_tickets")).toEqual(["tickets", "write", "power-user"]);
    expect(tagsOf("list_custom_roles")).toEqual(["custom-roles", "read", "admin"]);
    expect(tagsOf("search_custom_fields")).toEqual(["custom-fields", "search", "basic"]);
    expect(tagsOf("delete_asset")).toEqual(["assets", "delete", "admin"]);
    expect(tagsOf("disable_user")).toEqual(["users", "write", "admin"]);
    expect(tagsOf("bulk_update")).toEqual(["search", "write", "power-user"]);
  });

  it("reports an unknown tool", async () => {
    const { ctx } = createToolContext(mockFetch());

    const result = await executeTool("close_all_tickets", {}, ctx);

    expect(result).toEqual({
      content: [{ type: "text", text: "ERROR: Unknown tool: close_all_tickets" }],
      isError: true,
    });
  });
});

describe("argument decoding", () => {
  it("rejects arguments of the wrong type without calling RT", async () => {
    const fetch = mockFetch();
    const { ctx } = createToolContext(fetch);

    const result = await executeTool("get_ticket", { ticket_id: "abc" }, ctx);

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      "ERROR: Invalid arguments: ticket_id: Expected number, received string"
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it("lists every missing field", async () => {
    const { ctx } = createToolContext(mockFetch());

    const result = await executeTool("create_ticket", {}, ctx);

    expect(textOf(result)).toBe("ERROR: Invalid arguments: queue: Required, subject: Required");
  });

  it("drops undeclared keys and applies defaults", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ id: 101 }, 201));
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "create_ticket",
      { queue: "General", subject: "Printer on fire", bogus: true },
      ctx
    );

    expect(JSON.parse(fetch.mock.calls[0][1].body)).toEqual({
      Queue: "General",
      Subject: "Printer on fire",
      Priority: 0,
      Status: "new",
    });
    expect(jsonOf(result)).toEqual({ id: 101 });
  });
});

describe("tool errors", () => {
  it("logs and re-throws the typed error from invoke", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ message: "No ticket 9" }, 404));
    const { ctx, lines } = createToolContext(fetch);

    await expect(getTicket.invoke({ ticket_id: 9 }, ctx)).rejects.toBeInstanceOf(NotFoundError);
    expect(lines).toContain(
      "[test] ERROR get_ticket failed: NotFoundError: Resource not found: No ticket 9"
    );
  });

  it("renders the error as a tool result", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ message: "No ticket 9" }, 404));
    const { ctx } = createToolContext(fetch);

    const result = await executeTool("get_ticket", { ticket_id: 9 }, ctx);

    expect(result).toEqual({
      content: [{ type: "text", text: "ERROR: NotFoundError: Resource not found: No ticket 9" }],
      isError: true,
    });
  });
});

describe("ticket tools", () => {
  it("adds the etag to get_ticket", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ id: 7, Status: "open" }, 200, { etag: '"v2"' })
    );
    const { ctx } = createToolContext(fetch);

    const result = await executeTool("get_ticket", { ticket_id: 7 }, ctx);

    expect(jsonOf(result)).toEqual({ id: 7, Status: "open", _etag: '"v2"' });
  });

  it("makes update_ticket conditional on the etag", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ message: "Precondition failed" }, 412)
    );
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "update_ticket",
      { ticket_id: 7, status: "resolved", etag: '"v1"' },
      ctx
    );

    const init = fetch.mock.calls[0][1];
    expect(init.headers["If-Match"]).toBe('"v1"');
    expect(JSON.parse(init.body)).toEqual({ Status: "resolved" });
    expect(textOf(result)).toBe("ERROR: ConflictError: Conflict: Precondition failed");
  });

  it("links tickets by link type", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(["Link created"]));
    const { ctx } = createToolContext(fetch);

    await executeTool(
      "link_tickets",
      { ticket_id: 3, link_type: "DependsOn", target_ticket_id: 7 },
      ctx
    );

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://rt.example.com/REST/2.0/ticket/3/links");
    expect(JSON.parse(init.body)).toEqual({ DependsOn: 7 });
  });

  it("merges into the target ticket", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(["Merge successful"]));
    const { ctx } = createToolContext(fetch);

    await executeTool("merge_tickets", { ticket_id: 3, into_ticket_id: 4 }, ctx);

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://rt.example.com/REST/2.0/ticket/3/merge");
    expect(JSON.parse(init.body)).toEqual({ Into: 4 });
  });
});

describe("user tools", () => {
  it("sends booleans as RT flags", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ id: 20 }, 201));
    const { ctx } = createToolContext(fetch);

    await executeTool(
      "create_user",
      { name: "bob", email_address: "bob@example.com", privileged: true },
      ctx
    );

    expect(JSON.parse(fetch.mock.calls[0][1].body)).toEqual({
      Name: "bob",
      EmailAddress: "bob@example.com",
      Privileged: 1,
      Disabled: 0,
    });
  });

  it("disables a user", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(["User disabled"]));
    const { ctx, lines } = createToolContext(fetch);

    await executeTool("disable_user", { user_id: "bob" }, ctx);

    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe("https://rt.example.com/REST/2.0/user/bob");
    expect(init.method).toBe("PUT");
    expect(JSON.parse(init.body)).toEqual({ Disabled: 1 });
    expect(lines).toEqual(["[test] WARN Disabling user bob"]);
  });
});

describe("attachment tools", () => {
  it("decodes base64 content for upload", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(["Attachment added"], 201));
    const { ctx } = createToolContext(fetch);

    await executeTool(
      "upload_attachment",
      { ticket_id: 9, filename: "notes.txt", content_base64: "aGVsbG8=" },
      ctx
    );

    const body = fetch.mock.calls[0][1].body;
    expect(body).toBeInstanceOf(FormData);
    expect(await body.get("attachment").text()).toBe("hello");
  });

  it("rejects content that is not base64", async () => {
    const fetch = mockFetch();
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "upload_attachment",
      { ticket_id: 9, filename: "notes.txt", content_base64: "not base64!" },
      ctx
    );

    expect(result.isError).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("returns downloaded content as base64", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      new Response(new Uint8Array([1, 2, 3]), {
        status: 200,
        headers: { "content-type": "application/pdf" },
      })
    );
    const { ctx } = createToolContext(fetch);

    const result = await executeTool("get_attachment_content", { attachment_id: 12 }, ctx);

    expect(jsonOf(result)).toEqual({
      attachment_id: 12,
      content_type: "application/pdf",
      content_base64: "AQID",
      size_bytes: 3,
    });
  });
});

describe("bulk_update", () => {
  it("reports per-object outcomes", async () => {
    const fetch = mockFetch()
      .mockResolvedValueOnce(jsonResponse(["Ticket 1: Status changed"]))
      .mockResolvedValueOnce(jsonResponse({ message: "No ticket 2" }, 404))
      .mockResolvedValueOnce(jsonResponse(["Ticket 3: Status changed"]));
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "bulk_update",
      { object_type: "ticket", object_ids: [1, 2, 3], updates: { Status: "resolved" } },
      ctx
    );

    expect(result.isError).toBeUndefined();
    expect(jsonOf(result)).toEqual({
      total: 3,
      success_count: 2,
      failed_count: 1,
      results: {
        success: [1, 3],
        failed: [{ id: 2, error: "Resource not found: No ticket 2" }],
      },
    });
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      "https://rt.example.com/REST/2.0/ticket/1",
      "https://rt.example.com/REST/2.0/ticket/2",
      "https://rt.example.com/REST/2.0/ticket/3",
    ]);
  });

  it("sends booleans as RT flags", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse(["User updated"]));
    const { ctx } = createToolContext(fetch);

    await executeTool(
      "bulk_update",
      { object_type: "user", object_ids: ["bob"], updates: { Privileged: true, Disabled: false } },
      ctx
    );

    expect(JSON.parse(fetch.mock.calls[0][1].body)).toEqual({ Privileged: 1, Disabled: 0 });
  });

  it("reports progress after every object", async () => {
    const fetch = mockFetch()
      .mockResolvedValueOnce(jsonResponse(["ok"]))
      .mockResolvedValueOnce(jsonResponse({ message: "No ticket 2" }, 404));
    const { ctx } = createToolContext(fetch);
    const progress: Array<[number, number, string | undefined]> = [];
    ctx.reportProgress = async (done, total, message) => {
      progress.push([done, total, message]);
    };

    await executeTool(
      "bulk_update",
      { object_type: "ticket", object_ids: [1, 2], updates: { Status: "open" } },
      ctx
    );

    expect(progress).toEqual([
      [1, 2, "Updated ticket 1"],
      [2, 2, "Failed ticket 2: Resource not found: No ticket 2"],
    ]);
  });

  it("requires at least one id", async () => {
    const { ctx } = createToolContext(mockFetch());

    const result = await executeTool(
      "bulk_update",
      { object_type: "ticket", object_ids: [], updates: {} },
      ctx
    );

    expect(textOf(result)).toBe(
      "ERROR: Invalid arguments: object_ids: Array must contain at least 1 element(s)"
    );
  });
});

describe("advanced_ticket_search", () => {
  it("pages at the maximum page size", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ page: 1, pages: 1, total: 2, count: 2, items: [{ id: 1 }, { id: 2 }] })
    );
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "advanced_ticket_search",
      { query: "Queue = 'General'" },
      ctx
    );

    expect(fetch.mock.calls[0][0]).toBe(
      "https://rt.example.com/REST/2.0/tickets?query=Queue+%3D+%27General%27&page=1&per_page=100"
    );
    expect(jsonOf(result)).toEqual({
      query: "Queue = 'General'",
      total_available: 2,
      retrieved_count: 2,
      max_results: 1000,
      items: [{ id: 1 }, { id: 2 }],
    });
  });

  it("returns nothing for max_results 0", async () => {
    const fetch = mockFetch();
    const { ctx } = createToolContext(fetch);

    const result = await executeTool(
      "advanced_ticket_search",
      { query: "Status = 'open'", max_results: 0 },
      ctx
    );

    expect(fetch).not.toHaveBeenCalled();
    expect(jsonOf(result)).toMatchObject({ total_available: 0, retrieved_count: 0, items: [] });
  });
});
