/**
 * Streamable HTTP mode. Stateless: every POST gets its own MCP server and
 * transport over the shared RT client.
 *
 * @module http
 */

import type { Server as HttpServer } from "node:http";

import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import express, { type Express, type Request, type Response } from "express";

import { createServer } from "./server.js";
import type { ToolContext } from "./tools/index.js";
import { formatError } from "./utils.js";

export const MCP_PATH = "/mcp";

// Attachments arrive base64 encoded inside the JSON-RPC body
const BODY_LIMIT = "25mb";

function rpcError(res: Response, status: number, code: number, message: string) {
  res.status(status).json({ jsonrpc: "2.0", error: { code, message }, id: null });
}

export function createHttpApp(ctx: ToolContext): Express {
  const log = ctx.log.child("http");
  const app = express();
  app.use(express.json({ limit: BODY_LIMIT }));

  app.post(MCP_PATH, async (req: Request, res: Response) => {
    const server = createServer(ctx);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) =>
        log.warn(`Failed to release MCP request: ${formatError(error)}`)
      );
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error(`MCP request failed: ${formatError(error)}`);
      if (!res.headersSent) {
        rpcError(res, 500, -32603, "Internal server error");
      }
    }
  });

  // No sessions, so no server-initiated stream and nothing to delete
  const methodNotAllowed = (_req: Request, res: Response) => {
    rpcError(res, 405, -32000, "Method not allowed.");
  };
  app.get(MCP_PATH, methodNotAllowed);
  app.delete(MCP_PATH, methodNotAllowed);

  return app;
}

/**
 * Start listening. Resolves once the socket is bound.
 */
export function listen(app: Express, host: string, port: number): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
}

export function closeHttpServer(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
