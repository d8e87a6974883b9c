/**
 * Ticket tools: CRUD, replies, ownership, links and merges.
 *
 * @module tools/tickets
 */

import { z } from "zod";

import { isJsonObject } from "../types.js";
import { countOf, rtFields } from "../utils.js";
import { numericId, searchArgs } from "./common.js";
import { defineTool } from "./types.js";

const ticketId = numericId("ticket");

const recipients = z
  .union([z.string(), z.array(z.string())])
  .optional();

export const LINK_TYPES = [
  "DependsOn",
  "DependedOnBy",
  "MemberOf",
  "Members",
  "RefersTo",
  "ReferredToBy",
  "Parent",
  "Child",
] as const;

export const createTicket = defineTool({
  name: "create_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description: "Create a new ticket in Request Tracker",
  annotations: { title: "Create RT Ticket", readOnlyHint: false },
  schema: z.object({
    queue: z.string().min(1).describe("Queue name or ID"),
    subject: z.string().min(1).describe("Ticket subject"),
    requestor: z.string().optional().describe("Requestor email"),
    content: z.string().optional().describe("Initial ticket content"),
    priority: z.number().int().min(0).max(99).default(0).describe("Priority 0-99"),
    status: z.string().default("new").describe("Initial status (default: new)"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Creating ticket in '${args.queue}': ${args.subject}`);
    const result = await client.create(
      "ticket",
      rtFields({
        Queue: args.queue,
        Subject: args.subject,
        Priority: args.priority,
        Status: args.status,
        Requestor: args.requestor || undefined,
        Content: args.content || undefined,
      })
    );
    log.info(`Created ticket ${isJsonObject(result) ? String(result.id ?? "unknown") : "unknown"}`);
    return result;
  },
});

export const getTicket = defineTool({
  name: "get_ticket",
  tags: { area: "tickets", access: "read", tier: "basic" },
  description:
    "Get ticket details by ID. The response carries the ticket's current _etag when RT provides one; pass it to update_ticket for a conditional update.",
  annotations: { title: "Get RT Ticket", readOnlyHint: true },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching ticket ${args.ticket_id}`);
    const { ticket, etag } = await client.getTicket(args.ticket_id);
    if (etag && isJsonObject(ticket)) {
      return { ...ticket, _etag: etag };
    }
    return ticket;
  },
});

export const updateTicket = defineTool({
  name: "update_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description:
    "Update an existing ticket. Pass etag (from get_ticket) to reject the update if the ticket changed since it was read.",
  annotations: { title: "Update RT Ticket", readOnlyHint: false },
  schema: z.object({
    ticket_id: ticketId,
    subject: z.string().optional().describe("New subject"),
    status: z.string().optional().describe("New status"),
    priority: z.number().int().min(0).max(99).optional().describe("New priority"),
    owner: z.string().optional().describe("New owner"),
    etag: z.string().optional().describe("ETag for optimistic locking (If-Match)"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Updating ticket ${args.ticket_id}${args.etag ? " (conditional)" : ""}`);
    return client.update(
      "ticket",
      args.ticket_id,
      rtFields({
        Subject: args.subject,
        Status: args.status,
        Priority: args.priority,
        Owner: args.owner,
      }),
      args.etag
    );
  },
});

export const deleteTicket = defineTool({
  name: "delete_ticket",
  tags: { area: "tickets", access: "delete", tier: "admin" },
  description: "Delete (disable) a ticket",
  annotations: { title: "Delete RT Ticket", readOnlyHint: false, destructiveHint: true },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.warn(`Deleting ticket ${args.ticket_id}`);
    return client.remove("ticket", args.ticket_id);
  },
});

export const searchTickets = defineTool({
  name: "search_tickets",
  tags: { area: "tickets", access: "search", tier: "basic" },
  description: "Search tickets with RT query syntax",
  annotations: { title: "Search RT Tickets", readOnlyHint: true },
  schema: z.object(searchArgs),
  handler: async (args, { client, log }) => {
    log.info(`Searching tickets: ${args.query}`);
    const result = await client.searchTickets(args.query, args.page, args.per_page);
    log.info(
      `Found ${countOf(result, "total")} tickets, showing ${countOf(result, "count")} on page ${args.page}`
    );
    return result;
  },
});

export const correspondTicket = defineTool({
  name: "correspond_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description: "Add correspondence (customer-visible reply) to a ticket",
  annotations: { title: "Correspond on RT Ticket", readOnlyHint: false },
  schema: z.object({
    ticket_id: ticketId,
    content: z.string().min(1).describe("Reply content"),
    cc: recipients.describe("Additional CC recipients"),
    bcc: recipients.describe("Additional BCC recipients"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Adding correspondence to ticket ${args.ticket_id}`);
    return client.correspond(
      args.ticket_id,
      rtFields({ Content: args.content, Cc: args.cc || undefined, Bcc: args.bcc || undefined })
    );
  },
});

export const commentTicket = defineTool({
  name: "comment_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description: "Add internal comment (not visible to customer) to a ticket",
  annotations: { title: "Comment on RT Ticket", readOnlyHint: false },
  schema: z.object({
    ticket_id: ticketId,
    content: z.string().min(1).describe("Comment content"),
  }),
  handler: async (args, { client, log }) => {
    log.info(`Adding comment to ticket ${args.ticket_id}`);
    return client.comment(args.ticket_id, { Content: args.content });
  },
});

export const takeTicket = defineTool({
  name: "take_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description: "Take ownership of a ticket",
  annotations: { title: "Take Ownership of RT Ticket", readOnlyHint: false },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.info(`Taking ownership of ticket ${args.ticket_id}`);
    return client.changeOwnership(args.ticket_id, "take");
  },
});

export const stealTicket = defineTool({
  name: "steal_ticket",
  tags: { area: "tickets", access: "write", tier: "power-user" },
  description: "Steal ownership of a ticket from another user",
  annotations: { title: "Steal RT Ticket Ownership", readOnlyHint: false },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.warn(`Stealing ownership of ticket ${args.ticket_id}`);
    return client.changeOwnership(args.ticket_id, "steal");
  },
});

export const untakeTicket = defineTool({
  name: "untake_ticket",
  tags: { area: "tickets", access: "write", tier: "basic" },
  description: "Release ownership of a ticket (set owner to Nobody)",
  annotations: { title: "Release RT Ticket Ownership", readOnlyHint: false },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.info(`Releasing ownership of ticket ${args.ticket_id}`);
    return client.changeOwnership(args.ticket_id, "untake");
  },
});

export const mergeTickets = defineTool({
  name: "merge_tickets",
  tags: { area: "tickets", access: "write", tier: "power-user" },
  description: "Merge one ticket into another",
  annotations: { title: "Merge RT Tickets", readOnlyHint: false, destructiveHint: true },
  schema: z.object({
    ticket_id: numericId("ticket").describe("Ticket ID to merge from"),
    into_ticket_id: numericId("ticket").describe("Ticket ID to merge into"),
  }),
  handler: async (args, { client, log }) => {
    log.warn(`Merging ticket ${args.ticket_id} into ${args.into_ticket_id}`);
    return client.mergeTickets(args.ticket_id, args.into_ticket_id);
  },
});

export const getTicketHistory = defineTool({
  name: "get_ticket_history",
  tags: { area: "tickets", access: "read", tier: "basic" },
  description: "Get transaction history for a ticket",
  annotations: { title: "Get RT Ticket History", readOnlyHint: true },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching history for ticket ${args.ticket_id}`);
    return client.ticketHistory(args.ticket_id);
  },
});

export const getTicketAttachments = defineTool({
  name: "get_ticket_attachments",
  tags: { area: "tickets", access: "read", tier: "basic" },
  description: "Get attachments for a ticket",
  annotations: { title: "Get RT Ticket Attachments", readOnlyHint: true },
  schema: z.object({ ticket_id: ticketId }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching attachments for ticket ${args.ticket_id}`);
    return client.ticketAttachments(args.ticket_id);
  },
});

export const linkTickets = defineTool({
  name: "link_tickets",
  tags: { area: "tickets", access: "write", tier: "power-user" },
  description: "Create links between tickets",
  annotations: { title: "Link RT Tickets", readOnlyHint: false },
  schema: z.object({
    ticket_id: numericId("ticket").describe("Source ticket ID"),
    link_type: z.enum(LINK_TYPES).describe("Link type"),
    target_ticket_id: numericId("ticket").describe("Target ticket ID"),
  }),
  handler: async (args, { client, log }) => {
    log.info(
      `Creating ${args.link_type} link from ticket ${args.ticket_id} to ${args.target_ticket_id}`
    );
    return client.linkTickets(args.ticket_id, { [args.link_type]: args.target_ticket_id });
  },
});

export const tools = [
  createTicket,
  getTicket,
  updateTicket,
  deleteTicket,
  searchTickets,
  correspondTicket,
  commentTicket,
  takeTicket,
  stealTicket,
  untakeTicket,
  mergeTickets,
  getTicketHistory,
  getTicketAttachments,
  linkTickets,
];
