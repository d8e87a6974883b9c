/**
 * Queue tools.
 *
 * @module tools/queues
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const queue = labels("queue", "queue", "Queue", "queue");
const queueId = recordId("Queue");

const addressFields = {
  description: z.string().optional().describe("Queue description"),
  correspond_address: z.string().optional().describe("Email address for correspondence"),
  comment_address: z.string().optional().describe("Email address for comments"),
};

export const getQueue = defineTool({
  name: "get_queue",
  tags: { area: "queues", access: "read", tier: "basic" },
  description: "Get queue details by ID or name",
  annotations: { title: "Get RT Queue", readOnlyHint: true },
  schema: z.object({ queue_id: queueId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching queue ${args.queue_id}`);
    return client.retrieve("queue", args.queue_id);
  },
});

export const createQueue = defineTool({
  name: "create_queue",
  tags: { area: "queues", access: "write", tier: "admin" },
  description: "Create a new queue",
  annotations: { title: "Create RT Queue", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Queue name"),
    ...addressFields,
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating queue '${args.name}'`);
    return client.create(
      "queue",
      rtFields({
        Name: args.name,
        Description: args.description || undefined,
        CorrespondAddress: args.correspond_address || undefined,
        CommentAddress: args.comment_address || undefined,
      })
    );
  },
});

export const updateQueue = defineTool({
  name: "update_queue",
  tags: { area: "queues", access: "write", tier: "admin" },
  description: "Update an existing queue",
  annotations: { title: "Update RT Queue", readOnlyHint: false },
  schema: z.object({
    queue_id: queueId,
    name: z.string().optional().describe("New queue name"),
    ...addressFields,
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating queue ${args.queue_id}`);
    return client.update(
      "queue",
      args.queue_id,
      rtFields({
        Name: args.name || undefined,
        Description: args.description || undefined,
        CorrespondAddress: args.correspond_address || undefined,
        CommentAddress: args.comment_address || undefined,
      })
    );
  },
});

export const disableQueue = defineTool({
  name: "disable_queue",
  tags: { area: "queues", access: "write", tier: "admin" },
  description: "Disable a queue",
  annotations: { title: "Disable RT Queue", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ queue_id: queueId }),
  handler: async (args, { client, log }) => {
    log.warn(`Disabling queue ${args.queue_id}`);
    return client.update("queue", args.queue_id, rtFields({ Disabled: true }));
  },
});

export const enableQueue = defineTool({
  name: "enable_queue",
  tags: { area: "queues", access: "write", tier: "admin" },
  description: "Enable a disabled queue",
  annotations: { title: "Enable RT Queue", readOnlyHint: false },
  schema: z.object({ queue_id: queueId }),
  handler: async (args, { client, log }) => {
    log.info(`Enabling queue ${args.queue_id}`);
    return client.update("queue", args.queue_id, rtFields({ Disabled: false }));
  },
});

export const tools = [
  listTool(queue),
  getQueue,
  createQueue,
  updateQueue,
  searchTool(queue),
  disableQueue,
  enableQueue,
];
