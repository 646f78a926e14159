import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { RecallDatabase } from "../db/database.js";
import { guardSetup, jsonResult } from "./respond.js";

export function registerSearchConversationTitles(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "search_conversation_titles",
    "Search conversation titles by substring. Useful when you remember the topic but not the conversation ID. Returns up to 100 summaries with message counts, newest first.",
    {
      query: z
        .string()
        .max(500, "The query cannot exceed 500 characters")
        .describe("Text to find in conversation titles"),
    },
    async ({ query }) =>
      guardSetup(async () => {
        const items = await db.searchConversationTitles(query);
        return jsonResult({ items });
      })
  );
}
