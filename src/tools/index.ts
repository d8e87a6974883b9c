/**
 * Tool registry. Every RT tool, looked up by name.
 *
 * @module tools
 */

import { err, formatError, type ToolResult } from "../utils.js";
import type { ToolContext, ToolDefinition, ToolModule } from "./types.js";

import * as tickets from "./tickets.js";
import * as queues from "./queues.js";
import * as users from "./users.js";
import * as groups from "./groups.js";
import * as assets from "./assets.js";
import * as catalogs from "./catalogs.js";
import * as customfields from "./customfields.js";
import * as customroles from "./customroles.js";
import * as transactions from "./transactions.js";
import * as attachments from "./attachments.js";
import * as search from "./search.js";

export type { ProgressReporter, ToolContext, ToolDefinition, ToolModule } from "./types.js";

export const tools: ToolModule[] = [
  ...tickets.tools,
  ...queues.tools,
  ...users.tools,
  ...groups.tools,
  ...assets.tools,
  ...catalogs.tools,
  ...customfields.tools,
  ...customroles.tools,
  ...transactions.tools,
  ...attachments.tools,
  ...search.tools,
];

/**
 * Get tool definitions for ListTools response.
 */
export function getToolDefinitions(): ToolDefinition[] {
  return tools.map((t) => t.definition);
}

/**
 * Find a tool by name and execute it. RT errors come back as MCP error results.
 */
export async function executeTool(
  name: string,
  rawArgs: unknown,
  ctx: ToolContext
): Promise<ToolResult> {
  const tool = tools.find((t) => t.definition.name === name);
  if (!tool) {
    return err(`Unknown tool: ${name}`);
  }

  try {
    return await tool.invoke(rawArgs, ctx);
  } catch (error) {
    return err(formatError(error));
  }
}
