/**
 * MCP server wiring: tool and resource handlers over a shared RT client.
 *
 * @module server
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { getResourceDefinitions, readResource } from "./resources.js";
import {
  executeTool,
  getToolDefinitions,
  type ProgressReporter,
  type ToolContext,
} from "./tools/index.js";

export const SERVER_NAME = "rt-mcp-server";
export const SERVER_VERSION = "0.1.0";

export const INSTRUCTIONS = `Request Tracker (RT) REST2 API server.

Tools cover tickets, queues, users, groups, assets, catalogs, transactions,
attachments, custom fields and custom roles. Read-only tools are annotated
with readOnlyHint; destructive ones with destructiveHint.

Use get_ticket to read a ticket's _etag and pass it to update_ticket to avoid
overwriting concurrent changes.`;

export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
      instructions: INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args, _meta } = request.params;
    const progressToken = _meta?.progressToken;
    const reportProgress: ProgressReporter | undefined =
      progressToken === undefined
        ? undefined
        : (progress, total, message) =>
            extra.sendNotification({
              method: "notifications/progress",
              params: { progressToken, progress, total, message },
            });
    return executeTool(name, args ?? {}, { ...ctx, reportProgress });
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: getResourceDefinitions() };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const result = await readResource(uri, ctx.client, ctx.log.child("resources"));
    if (!result) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
    return result;
  });

  return server;
}
