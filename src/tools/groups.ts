/**
 * Group tools and membership management.
 *
 * @module tools/groups
 */

import { z } from "zod";

import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const group = labels("group", "group", "Group", "group");
const groupId = recordId("Group");

export const getGroup = defineTool({
  name: "get_group",
  tags: { area: "groups", access: "read", tier: "basic" },
  description: "Get group details by ID or name",
  annotations: { title: "Get RT Group", readOnlyHint: true },
  schema: z.object({ group_id: groupId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching group ${args.group_id}`);
    return client.retrieve("group", args.group_id);
  },
});

export const createGroup = defineTool({
  name: "create_group",
  tags: { area: "groups", access: "write", tier: "admin" },
  description: "Create a new group",
  annotations: { title: "Create RT Group", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Group name"),
    description: z.string().optional().describe("Group description"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating group '${args.name}'`);
    return client.create(
      "group",
      rtFields({ Name: args.name, Description: args.description || undefined })
    );
  },
});

export const updateGroup = defineTool({
  name: "update_group",
  tags: { area: "groups", access: "write", tier: "admin" },
  description: "Update an existing group",
  annotations: { title: "Update RT Group", readOnlyHint: false },
  schema: z.object({
    group_id: groupId,
    name: z.string().optional().describe("New group name"),
    description: z.string().optional().describe("New description"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating group ${args.group_id}`);
    return client.update(
      "group",
      args.group_id,
      rtFields({ Name: args.name || undefined, Description: args.description || undefined })
    );
  },
});

export const deleteGroup = defineTool({
  name: "delete_group",
  tags: { area: "groups", access: "delete", tier: "admin" },
  description: "Delete a group",
  annotations: { title: "Delete RT Group", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ group_id: groupId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting group ${args.group_id}`);
    return client.remove("group", args.group_id);
  },
});

const membership = z.object({
  group_id: groupId,
  user_id: recordId("User"),
});

export const addGroupMember = defineTool({
  name: "add_group_member",
  tags: { area: "groups", access: "write", tier: "admin" },
  description: "Add a user to a group",
  annotations: { title: "Add Group Member", readOnlyHint: false },
  schema: membership,
  handler: async (args, { client, log }) => {
    log.info(`Adding user ${args.user_id} to group ${args.group_id}`);
    return client.addGroupMember(args.group_id, args.user_id);
  },
});

export const removeGroupMember = defineTool({
  name: "remove_group_member",
  tags: { area: "groups", access: "write", tier: "admin" },
  description: "Remove a user from a group",
  annotations: { title: "Remove Group Member", readOnlyHint: false },
  schema: membership,
  handler: async (args, { client, log }) => {
    log.info(`Removing user ${args.user_id} from group ${args.group_id}`);
    return client.removeGroupMember(args.group_id, args.user_id);
  },
});

export const tools = [
  listTool(group),
  getGroup,
  createGroup,
  updateGroup,
  deleteGroup,
  addGroupMember,
  removeGroupMember,
  searchTool(group),
];
