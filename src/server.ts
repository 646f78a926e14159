import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { RecallDatabase } from "./db/database.js";
import { registerAllTools } from "./tools/register-all.js";

export const SERVER_INFO = {
  name: "recall-mcp",
  version: "0.1.0",
} as const;

export function createServer(db: RecallDatabase): McpServer {
  const server = new McpServer(SERVER_INFO, {
    instructions:
      "Search and retrieve past conversations with the user, and store or recall memory notes.",
  });
  registerAllTools(server, db);
  return server;
}
