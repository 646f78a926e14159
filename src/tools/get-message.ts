import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "../db/database.js";
import { MessageIdParam } from "./schemas.js";
import { errorResult, guardSetup, jsonResult } from "./respond.js";

export function registerGetMessage(server: McpServer, db: RecallDatabase): void {
  server.tool(
    "get_message",
    "Retrieve a specific message by its ID, including content, role, tool calls and reasoning. Returns { not_found: true } when the id does not exist.",
    {
      message_id: MessageIdParam,
    },
    async ({ message_id }) =>
      guardSetup(async () => {
        const result = await db.getMessage(message_id);
        switch (result.status) {
          case "found":
            return jsonResult(result.value);
          case "not_found":
            return jsonResult({ not_found: true, message_id });
          case "error":
            return errorResult(`Could not read message ${message_id}: ${result.message}`);
        }
      })
  );
}
