#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ConfigError, dbFlagFrom, loadConfig } from "./config.js";
import type { RecallConfig } from "./config.js";
import { RecallDatabase } from "./db/database.js";
import { StoreHandle } from "./db/store.js";
import { createServer } from "./server.js";

function resolveConfig(): RecallConfig {
  try {
    return loadConfig(process.env, dbFlagFrom(process.argv.slice(2)));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[recall-mcp] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const { dbPath } = resolveConfig();

  // The store is opened on the first tool call, not here
  const store = new StoreHandle(dbPath);
  const server = createServer(new RecallDatabase(store));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[recall-mcp] MCP server started (store: ${dbPath})`);

  // Graceful shutdown: close the DB so SQLite can flush the WAL and release locks
  const shutdown = () => {
    store.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[recall-mcp] Error while closing the store:", err);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("[recall-mcp] Fatal:", err);
  process.exit(1);
});
