#!/usr/bin/env node

/**
 * rt-mcp-server: Request Tracker REST2 API as MCP tools, served over stdio
 * or streamable HTTP.
 *
 * @module index
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { RTClient } from "./client.js";
import { loadConfig } from "./config.js";
import { closeHttpServer, createHttpApp, listen, MCP_PATH } from "./http.js";
import { createLogger, type Logger } from "./logger.js";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server.js";
import { getToolDefinitions } from "./tools/index.js";
import { formatError } from "./utils.js";

async function main() {
  // Missing configuration is fatal before anything touches the network
  const config = loadConfig();
  const log = createLogger(SERVER_NAME, config.logLevel);
  const client = new RTClient(config, { logger: log.child("client") });

  log.info(`RT URL: ${client.baseUrl}`);
  log.info(`Auth: ${config.auth.scheme === "token" ? "Token" : "Basic"}`);
  log.info(`SSL verify: ${config.verifySsl}`);

  try {
    await client.validateConnection();
    log.info("RT connection validated");
  } catch (error) {
    log.warn(`RT connection not available: ${formatError(error)}`);
    log.warn("Starting anyway; tools will fail until RT is reachable");
  }

  const ctx = { client, config, log: log.child("tools") };

  if (config.transport.kind === "http") {
    const { host, port } = config.transport;
    const httpServer = await listen(createHttpApp(ctx), host, port).catch(async (error: unknown) => {
      await client.close();
      throw error;
    });

    const shutdown = once(() => closeHttpServer(httpServer).finally(() => client.close()));
    onSignals(log, shutdown);
    log.info(
      `${SERVER_NAME} v${SERVER_VERSION} listening on http://${host}:${port}${MCP_PATH} (${getToolDefinitions().length} tools)`
    );
    return;
  }

  const server = createServer(ctx);
  const shutdown = once(() => server.close().finally(() => client.close()));
  onSignals(log, shutdown);
  server.onclose = () => exitAfter(log, shutdown, "transport closed");

  try {
    await server.connect(new StdioServerTransport());
  } catch (error) {
    await client.close();
    throw error;
  }

  log.info(`${SERVER_NAME} v${SERVER_VERSION} ready (${getToolDefinitions().length} tools)`);
}

function once(close: () => Promise<void>): () => Promise<void> {
  let closing: Promise<void> | undefined;
  return () => (closing ??= close());
}

function exitAfter(log: Logger, shutdown: () => Promise<void>, reason: string) {
  log.info(`Shutting down (${reason})`);
  shutdown().then(
    () => process.exit(0),
    (error: unknown) => {
      log.error(`Shutdown failed: ${formatError(error)}`);
      process.exit(1);
    }
  );
}

function onSignals(log: Logger, shutdown: () => Promise<void>) {
  process.on("SIGINT", () => exitAfter(log, shutdown, "SIGINT"));
  process.on("SIGTERM", () => exitAfter(log, shutdown, "SIGTERM"));
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
