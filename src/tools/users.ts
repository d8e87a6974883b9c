/**
 * User tools, including enable/disable and privilege toggles.
 *
 * @module tools/users
 */

import { z } from "zod";

import type { JsonObject } from "../types.js";
import { rtFields } from "../utils.js";
import { labels, listTool, recordId, searchTool } from "./common.js";
import { defineTool, type ToolModule } from "./types.js";

const user = labels("user", "user", "User", "user");
const userId = recordId("User");

export const getUser = defineTool({
  name: "get_user",
  tags: { area: "users", access: "read", tier: "basic" },
  description: "Get user details by ID or username",
  annotations: { title: "Get RT User", readOnlyHint: true },
  schema: z.object({ user_id: userId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching user ${args.user_id}`);
    return client.retrieve("user", args.user_id);
  },
});

export const getCurrentUser = defineTool({
  name: "get_current_user",
  tags: { area: "users", access: "read", tier: "basic" },
  description: "Get the currently authenticated user",
  annotations: { title: "Get Current RT User", readOnlyHint: true },
  schema: z.object({}),
  handler: async (_args, { client, log }) => {
    log.info("Fetching current user");
    return client.currentUser();
  },
});

export const createUser = defineTool({
  name: "create_user",
  tags: { area: "users", access: "write", tier: "admin" },
  description: "Create a new user",
  annotations: { title: "Create RT User", readOnlyHint: false },
  schema: z.object({
    name: z.string().min(1).describe("Username"),
    email_address: z.string().min(1).describe("Email address"),
    real_name: z.string().optional().describe("Real name"),
    password: z.string().optional().describe("Password"),
    privileged: z.boolean().default(false).describe("Whether the user is privileged"),
    disabled: z.boolean().default(false).describe("Whether the user is disabled"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating user '${args.name}'`);
    return client.create(
      "user",
      rtFields({
        Name: args.name,
        EmailAddress: args.email_address,
        Privileged: args.privileged,
        Disabled: args.disabled,
        RealName: args.real_name || undefined,
        Password: args.password || undefined,
      })
    );
  },
});

export const updateUser = defineTool({
  name: "update_user",
  tags: { area: "users", access: "write", tier: "admin" },
  description: "Update an existing user",
  annotations: { title: "Update RT User", readOnlyHint: false },
  schema: z.object({
    user_id: userId,
    email_address: z.string().optional().describe("New email address"),
    real_name: z.string().optional().describe("New real name"),
    password: z.string().optional().describe("New password"),
    privileged: z.boolean().optional().describe("Whether the user is privileged"),
    disabled: z.boolean().optional().describe("Whether the user is disabled"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating user ${args.user_id}`);
    return client.update(
      "user",
      args.user_id,
      rtFields({
        EmailAddress: args.email_address || undefined,
        RealName: args.real_name || undefined,
        Password: args.password || undefined,
        Privileged: args.privileged,
        Disabled: args.disabled,
      })
    );
  },
});

interface UserToggle {
  name: string;
  description: string;
  title: string;
  /** Log phrase, completed by the user id ("Disabling user"). */
  action: string;
  payload: JsonObject;
  destructive?: boolean;
}

/** A one-field update addressed by user id. */
function userToggle({
  name,
  description,
  title,
  action,
  payload,
  destructive,
}: UserToggle): ToolModule {
  return defineTool({
    name,
    tags: { area: "users", access: "write", tier: "admin" },
    description,
    annotations: { title, readOnlyHint: false, ...(destructive ? { destructiveHint: true } : {}) },
    schema: z.object({ user_id: userId }),
    handler: async (args, { client, log }) => {
      const line = `${action} ${args.user_id}`;
      if (destructive) log.warn(line);
      else log.info(line);
      return client.update("user", args.user_id, payload);
    },
  });
}

export const disableUser = userToggle({
  name: "disable_user",
  description: "Disable a user account",
  title: "Disable RT User",
  action: "Disabling user",
  payload: { Disabled: 1 },
  destructive: true,
});
export const enableUser = userToggle({
  name: "enable_user",
  description: "Enable a disabled user account",
  title: "Enable RT User",
  action: "Enabling user",
  payload: { Disabled: 0 },
});
export const grantPrivilege = userToggle({
  name: "grant_privilege",
  description: "Grant privileged access to a user",
  title: "Grant RT User Privilege",
  action: "Granting privileged access to user",
  payload: { Privileged: 1 },
});
export const revokePrivilege = userToggle({
  name: "revoke_privilege",
  description: "Revoke privileged access from a user",
  title: "Revoke RT User Privilege",
  action: "Revoking privileged access from user",
  payload: { Privileged: 0 },
});

export const tools = [
  listTool(user),
  getUser,
  getCurrentUser,
  createUser,
  updateUser,
  searchTool(user),
  disableUser,
  enableUser,
  grantPrivilege,
  revokePrivilege,
];
