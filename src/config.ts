/**
 * Configuration — reads RT connection settings from environment variables.
 *
 * @module config
 */

import type { LogLevel } from "./logger.js";

export type RTAuth =
  | { scheme: "token"; token: string }
  | { scheme: "basic"; user: string; password: string };

/** How the MCP server is served: stdio (default) or streamable HTTP. */
export type TransportConfig = { kind: "stdio" } | { kind: "http"; host: string; port: number };

export interface RTConfig {
  url: string;
  basePath: string;
  auth: RTAuth;
  /** Request timeout in milliseconds. */
  timeout: number;
  verifySsl: boolean;
  logLevel: LogLevel;
  transport: TransportConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Load and validate configuration from environment variables.
 * Throws a ConfigError naming every missing variable before any request is made.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RTConfig {
  const url = env.RT_URL?.trim();
  const token = env.RT_TOKEN?.trim();
  const user = env.RT_USER?.trim();
  const password = env.RT_PASSWORD;

  const missing: string[] = [];
  if (!url) missing.push("RT_URL");
  if (!token && !(user && password)) {
    missing.push("RT_TOKEN (or both RT_USER and RT_PASSWORD)");
  }

  if (!url || missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variable(s): ${missing.join(", ")}\n\n` +
        "Set them in your MCP client configuration:\n" +
        "  RT_URL       — RT instance URL (e.g. https://rt.example.com)\n" +
        "  RT_TOKEN     — RT auth token\n" +
        "  RT_USER      — RT username (basic auth, with RT_PASSWORD)\n" +
        "  RT_PASSWORD  — RT password\n" +
        "Optional:\n" +
        "  RT_MCP_TRANSPORT — stdio (default) or http; HTTP mode listens on HOST:PORT\n"
    );
  }

  let auth: RTAuth;
  if (token) {
    auth = { scheme: "token", token };
  } else if (user && password) {
    auth = { scheme: "basic", user, password };
  } else {
    throw new ConfigError("Either RT_TOKEN or both RT_USER and RT_PASSWORD must be set");
  }

  // Normalize instance URL: strip trailing slash, ensure a scheme
  let normalizedUrl = url.replace(/\/+$/, "");
  if (!/^https?:\/\//i.test(normalizedUrl)) {
    normalizedUrl = `https://${normalizedUrl}`;
  }

  const timeoutSeconds = parseInt(env.RT_TIMEOUT ?? "30", 10);
  const logLevel = LOG_LEVELS.find((l) => l === env.RT_LOG_LEVEL?.toLowerCase()) ?? "info";

  return {
    url: normalizedUrl,
    basePath: normalizeBasePath(env.RT_BASE_PATH ?? "/REST/2.0"),
    auth,
    timeout: (isNaN(timeoutSeconds) || timeoutSeconds <= 0 ? 30 : timeoutSeconds) * 1000,
    verifySsl: parseFlag(env.RT_VERIFY_SSL, true),
    logLevel,
    transport: parseTransport(env),
  };
}

function parseTransport(env: NodeJS.ProcessEnv): TransportConfig {
  const kind = (env.RT_MCP_TRANSPORT ?? "stdio").trim().toLowerCase();
  if (kind === "stdio" || kind === "") {
    return { kind: "stdio" };
  }
  if (kind !== "http") {
    throw new ConfigError(`RT_MCP_TRANSPORT must be "stdio" or "http", got "${kind}"`);
  }

  const port = Number(env.PORT?.trim() || "8000");
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be a port number, got "${env.PORT}"`);
  }
  return { kind: "http", host: env.HOST?.trim() || "127.0.0.1", port };
}

/**
 * Full base URL of the REST2 API. RT_URL may already include the base path.
 */
export function apiBaseUrl(config: Pick<RTConfig, "url" | "basePath">): string {
  if (config.basePath === "" || config.url.endsWith(config.basePath)) {
    return config.url;
  }
  return `${config.url}${config.basePath}`;
}

/**
 * Authorization header value for the active scheme (RFC 7617 for basic).
 */
export function authorizationHeader(auth: RTAuth): string {
  if (auth.scheme === "token") {
    return `token ${auth.token}`;
  }
  return "Basic " + Buffer.from(`${auth.user}:${auth.password}`, "utf8").toString("base64");
}

function normalizeBasePath(path: string): string {
  const trimmed = path.trim().replace(/\/+$/, "");
  if (trimmed === "") return "";
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}
