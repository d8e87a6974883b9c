/**
 * Transaction tools (read only).
 *
 * @module tools/transactions
 */

import { z } from "zod";

import { labels, listTool, numericId, searchTool } from "./common.js";
import { defineTool } from "./types.js";

const transaction = labels("transaction", "transaction", "Transaction", "transaction");

export const getTransaction = defineTool({
  name: "get_transaction",
  tags: { area: "transactions", access: "read", tier: "basic" },
  description: "Get transaction details by ID",
  annotations: { title: "Get RT Transaction", readOnlyHint: true },
  schema: z.object({ transaction_id: numericId("transaction") }),
  handler: async (args, { client, log }) => {
    log.info(`Fetching transaction ${args.transaction_id}`);
    return client.retrieve("transaction", args.transaction_id);
  },
});

export const tools = [getTransaction, listTool(transaction), searchTool(transaction)];
