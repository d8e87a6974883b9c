/**
 * Attachment tools. Binary content crosses the tool boundary as base64.
 *
 * @module tools/attachments
 */

import { z } from "zod";

import { numericId } from "./common.js";
import { defineTool } from "./types.js";

export const getAttachment = defineTool({
  name: "get_attachment",
  tags: { area: "attachments", access: "read", tier: "basic" },
  description: "Get attachment metadata by ID",
  annotations: { title: "Get RT Attachment", readOnlyHint: true },
  schema: z.object({ attachment_id: numericId("attachment") }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching attachment ${args.attachment_id}`);
    return client.retrieve("attachment", args.attachment_id);
  },
});

export const getAttachmentContent = defineTool({
  name: "get_attachment_content",
  tags: { area: "attachments", access: "read", tier: "basic" },
  description: "Get attachment content (binary data as base64)",
  annotations: { title: "Get RT Attachment Content", readOnlyHint: true },
  schema: z.object({ attachment_id: numericId("attachment") }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching content for attachment ${args.attachment_id}`);
    const { data, contentType } = await client.getAttachmentContent(args.attachment_id);
    log.info(`Retrieved ${data.length} bytes`);
    return {
      attachment_id: args.attachment_id,
      content_type: contentType,
      content_base64: data.toString("base64"),
      size_bytes: data.length,
    };
  },
});

export const uploadAttachment = defineTool({
  name: "upload_attachment",
  tags: { area: "attachments", access: "write", tier: "basic" },
  description: "Upload an attachment to a ticket",
  annotations: { title: "Upload RT Attachment", readOnlyHint: false },
  schema: z.object({
    ticket_id: numericId("ticket"),
    filename: z.string().min(1).describe("File name shown in RT"),
    content_base64: z.string().base64().describe("File content, base64 encoded"),
    content_type: z
      .string()
      .optional()
      .describe("MIME type (default: application/octet-stream)"),
  }),
  handler: async (args, { client, log }) => {
    const content = Buffer.from(args.content_base64, "base64");
    log.info(
      `Uploading attachment '${args.filename}' (${content.length} bytes) to ticket ${args.ticket_id}`
    );
    return client.uploadAttachment(args.ticket_id, args.filename, content, args.content_type);
  },
});

export const tools = [getAttachment, getAttachmentContent, uploadAttachment];
