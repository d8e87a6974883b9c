import { vi } from "vitest";

import { RTClient } from "../src/client.js";
import type { RTConfig } from "../src/config.js";
import { createLogger, type Logger } from "../src/logger.js";
import type { ToolContext } from "../src/tools/index.js";

export function testConfig(overrides: Partial<RTConfig> = {}): RTConfig {
  return {
    url: "https://rt.example.com",
    basePath: "/REST/2.0",
    auth: { scheme: "token", token: "test-token" },
    timeout: 5000,
    verifySsl: true,
    logLevel: "error",
    transport: { kind: "stdio" },
    ...overrides,
  };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status, headers: { "content-type": "text/plain" } });
}

/** Logger that records every line, whatever its level. */
export function recordingLogger(): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  return { log: createLogger("test", "debug", (line) => lines.push(line)), lines };
}

export function mockFetch() {
  return vi.fn();
}

export function createTestClient(fetch: ReturnType<typeof mockFetch>, config = testConfig()) {
  return new RTClient(config, { fetch, logger: createLogger("test", "error", () => {}) });
}

export function createToolContext(fetch: ReturnType<typeof mockFetch>): {
  ctx: ToolContext;
  lines: string[];
} {
  const config = testConfig();
  const { log, lines } = recordingLogger();
  return { ctx: { client: createTestClient(fetch, config), config, log }, lines };
}
