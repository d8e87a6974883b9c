/**
 * Read-only MCP resources with RT reference data.
 *
 * @module resources
 */

import type { RTClient } from "./client.js";
import type { Logger } from "./logger.js";
import type { JsonValue } from "./types.js";
import { formatError } from "./utils.js";

export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: "application/json";
}

interface ResourceModule {
  definition: ResourceDefinition;
  load(client: RTClient): Promise<JsonValue>;
}

export type ResourceContents = {
  contents: Array<{ uri: string; mimeType: string; text: string }>;
};

export const resources: ResourceModule[] = [
  {
    definition: {
      uri: "rt://queues/list",
      name: "RT queues",
      description: "All queues, for quick reference when creating or searching tickets",
      mimeType: "application/json",
    },
    load: (client) => client.list("queue"),
  },
  {
    definition: {
      uri: "rt://custom-fields/list",
      name: "RT custom fields",
      description: "All custom fields",
      mimeType: "application/json",
    },
    load: (client) => client.list("customfield"),
  },
  {
    definition: {
      uri: "rt://user/current",
      name: "Current RT user",
      description: "The authenticated user",
      mimeType: "application/json",
    },
    load: (client) => client.currentUser(),
  },
  {
    definition: {
      uri: "rt://server/info",
      name: "RT server info",
      description: "RT version and REST2 API information",
      mimeType: "application/json",
    },
    load: (client) => client.serverInfo(),
  },
];

export function getResourceDefinitions(): ResourceDefinition[] {
  return resources.map((r) => r.definition);
}

/**
 * Read a resource. Unknown URIs return undefined; RT failures are logged and
 * rendered as an `{"error": ...}` document.
 */
export async function readResource(
  uri: string,
  client: RTClient,
  log: Logger
): Promise<ResourceContents | undefined> {
  const resource = resources.find((r) => r.definition.uri === uri);
  if (!resource) return undefined;

  let data: JsonValue;
  try {
    log.info(`Fetching resource ${uri}`);
    data = await resource.load(client);
  } catch (error) {
    log.error(`Failed to fetch resource ${uri}: ${formatError(error)}`);
    data = { error: formatError(error) };
  }

  return {
    contents: [{ uri, mimeType: resource.definition.mimeType, text: JSON.stringify(data, null, 2) }],
  };
}
