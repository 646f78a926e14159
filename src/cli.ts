#!/usr/bin/env node
/**
 * recall-cli — command-line interface for recall-mcp
 *
 * Usage: recall-cli [--db <path>] [--json] <command> [args] [options]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { ConfigError, loadConfig } from "./config.js";
import { RecallDatabase } from "./db/database.js";
import { StoreHandle } from "./db/store.js";
import type { ConversationSummary, SearchResult } from "./types/conversation.js";
import type { MemoryEntry } from "./types/memory.js";

// ─── Arg parser ──────────────────────────────────────────────────────────────

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = argv.slice(2); // remove node + script
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // --json and --yes never take a value
      if (next !== undefined && !next.startsWith("--") && key !== "json" && key !== "yes") {
        flags[key] = next;
        i++;
      } else {
        flags[key] = true;
      }
    } else if (command === undefined) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command: command ?? "help", positional, flags };
}

export class UsageError extends Error {
  override readonly name = "UsageError";
}

function stringFlag(flags: ParsedArgs["flags"], key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" ? value : undefined;
}

function intArg(raw: string | undefined, what: string): number {
  const value = raw !== undefined ? Number(raw) : NaN;
  if (!Number.isInteger(value)) throw new UsageError(`${what} must be an integer.`);
  return value;
}

// ─── Output helpers ───────────────────────────────────────────────────────────

function pad(s: string, n: number): string {
  return s.length >= n ? s.slice(0, n) : s + " ".repeat(n - s.length);
}

export function truncate(s: string, n: number): string {
  const oneLine = s.replace(/\n/g, " ");
  return oneLine.length > n ? oneLine.slice(0, n - 1) + "…" : oneLine;
}

function formatTime(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}

function printSummaries(rows: ConversationSummary[]): void {
  console.log(`  ${"ID".padEnd(12)}  ${"Created".padEnd(19)}  ${"Msgs".padEnd(5)}  Title`);
  console.log(`  ${"─".repeat(12)}  ${"─".repeat(19)}  ${"─".repeat(5)}  ${"─".repeat(40)}`);
  for (const c of rows) {
    console.log(`  ${pad(c.id, 12)}  ${formatTime(c.created_at)}  ${pad(String(c.message_count), 5)}  ${truncate(c.title, 50)}`);
  }
}

function printHits(rows: SearchResult[]): void {
  for (const hit of rows) {
    console.log(`  ${pad(hit.conversation_id, 12)}  #${pad(String(hit.message_id), 6)}  ${pad(hit.role, 9)}  ${truncate(hit.content_preview, 60)}`);
  }
}

function printMemories(rows: MemoryEntry[]): void {
  console.log(`  ${"ID".padEnd(6)}  ${"Imp".padEnd(3)}  ${"Category".padEnd(14)}  Content`);
  console.log(`  ${"─".repeat(6)}  ${"─".repeat(3)}  ${"─".repeat(14)}  ${"─".repeat(50)}`);
  for (const m of rows) {
    console.log(`  ${pad(String(m.id), 6)}  ${pad(String(m.importance), 3)}  ${pad(m.category ?? "—", 14)}  ${truncate(m.content, 60)}`);
  }
}

function printMemoryFull(m: MemoryEntry): void {
  console.log(`\nID:         ${m.id}`);
  console.log(`Category:   ${m.category ?? "(none)"}`);
  console.log(`Importance: ${m.importance}`);
  console.log(`Created:    ${formatTime(m.created_at)}`);
  console.log(`\nContent:\n${m.content}\n`);
}

// ─── Help ─────────────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
recall-cli — CLI for the recall-mcp conversation and memory store

USAGE
  recall-cli [--db <path>] [--json] <command> [args] [options]

GLOBAL FLAGS
  --db <path>     Path to the SQLite file (default: $RECALL_DB_PATH)
  --json          JSON output (for scripting)

CONVERSATIONS
  search <kw...>              Full-text search over messages (any keyword)
  conversation <id>           Show a conversation with all its messages
  titles <query>              Find conversations whose title contains <query>
  list                        List conversations, newest first
    --limit <n>                 Max results (default: 50, max: 200)
    --offset <n>                Skip the first n (default: 0)
  message <id>                Show a single message

MEMORY
  remember <content>          Store a memory entry
    --category <cat>            Grouping tag
    --importance <1-10>         Priority (default: 5)
  memory <id>                 Show a memory entry
  recall <kw...>              Full-text search over memory (best match first)
  category <name>             Memory entries in a category, most important first
  forget <id>                 Delete a memory entry (asks for confirmation)
    --yes                       Skip confirmation

  help                        Show this help
`);
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/** Runs one command and returns the process exit code. */
export async function run(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { command, positional, flags } = parseArgs(argv);
  const asJson = flags["json"] === true;

  if (command === "help") {
    printHelp();
    return 0;
  }

  const { dbPath } = loadConfig(env, stringFlag(flags, "db"));
  const store = new StoreHandle(dbPath);
  const db = new RecallDatabase(store);

  const output = (data: unknown): void => {
    console.log(JSON.stringify(data, null, 2));
  };

  try {
    switch (command) {
      // ── search ────────────────────────────────────────────────────────────
      case "search": {
        if (positional.length === 0) throw new UsageError("at least one keyword is required.");
        const hits = await db.searchConversations(positional);
        if (asJson) { output({ items: hits }); break; }

        console.log(`\n  ${hits.length} matching message${hits.length === 1 ? "" : "s"}\n`);
        printHits(hits);
        console.log();
        break;
      }

      // ── conversation ──────────────────────────────────────────────────────
      case "conversation": {
        const id = positional[0];
        if (!id) throw new UsageError("a conversation ID is required.");

        const result = await db.getConversation(id);
        if (result.status === "error") { console.error(`Error: ${result.message}`); return 1; }
        if (result.status === "not_found") { console.error(`Error: conversation '${id}' not found.`); return 1; }
        const conv = result.value;
        if (asJson) { output(conv); break; }

        console.log(`\n  ${conv.title}  (${conv.id}, ${formatTime(conv.created_at)})\n`);
        for (const m of conv.messages) {
          console.log(`  [${formatTime(m.created_at)}] ${m.role}${m.tool_name ? ` (${m.tool_name})` : ""}`);
          console.log(`  ${m.content.replace(/\n/g, "\n  ")}\n`);
        }
        break;
      }

      // ── titles ────────────────────────────────────────────────────────────
      case "titles": {
        const query = positional.join(" ");
        if (!query) throw new UsageError("a title query is required.");
        const rows = await db.searchConversationTitles(query);
        if (asJson) { output({ items: rows }); break; }

        console.log();
        printSummaries(rows);
        console.log();
        break;
      }

      // ── list ──────────────────────────────────────────────────────────────
      case "list": {
        const limitRaw = stringFlag(flags, "limit");
        const offsetRaw = stringFlag(flags, "offset");
        const limit = limitRaw !== undefined ? intArg(limitRaw, "--limit") : undefined;
        const offset = offsetRaw !== undefined ? intArg(offsetRaw, "--offset") : undefined;

        const rows = await db.listConversations({ limit, offset });
        if (asJson) { output({ items: rows }); break; }

        console.log();
        printSummaries(rows);
        console.log();
        break;
      }

      // ── message ───────────────────────────────────────────────────────────
      case "message": {
        const id = intArg(positional[0], "message ID");
        const result = await db.getMessage(id);
        if (result.status === "error") { console.error(`Error: ${result.message}`); return 1; }
        if (result.status === "not_found") { console.error(`Error: message ${id} not found.`); return 1; }
        const m = result.value;
        if (asJson) { output(m); break; }

        console.log(`\n  #${m.id} in ${m.conversation_id} — ${m.role} at ${formatTime(m.created_at)}\n`);
        console.log(m.content);
        console.log();
        break;
      }

      // ── remember ──────────────────────────────────────────────────────────
      case "remember": {
        const content = positional.join(" ");
        if (!content) throw new UsageError("content is required.");
        const importanceRaw = stringFlag(flags, "importance");
        const importance = importanceRaw !== undefined ? intArg(importanceRaw, "--importance") : undefined;
        if (importance !== undefined && (importance < 1 || importance > 10)) {
          throw new UsageError("--importance must be between 1 and 10.");
        }

        const result = await db.storeMemory({ content, category: stringFlag(flags, "category"), importance });
        if (!result.success) { console.error(`Error: ${result.error}`); return 1; }
        if (asJson) { output(result.memory); break; }

        console.log(`\n  ✓ Memory stored\n`);
        printMemoryFull(result.memory);
        break;
      }

      // ── memory ────────────────────────────────────────────────────────────
      case "memory": {
        const id = intArg(positional[0], "memory ID");
        const result = await db.getMemory(id);
        if (result.status === "error") { console.error(`Error: ${result.message}`); return 1; }
        if (result.status === "not_found") { console.error(`Error: memory ${id} not found.`); return 1; }
        if (asJson) { output(result.value); break; }
        printMemoryFull(result.value);
        break;
      }

      // ── recall ────────────────────────────────────────────────────────────
      case "recall": {
        if (positional.length === 0) throw new UsageError("at least one keyword is required.");
        const rows = await db.searchMemory(positional);
        if (asJson) { output({ items: rows }); break; }

        console.log();
        printMemories(rows);
        console.log();
        break;
      }

      // ── category ──────────────────────────────────────────────────────────
      case "category": {
        const category = positional[0];
        if (!category) throw new UsageError("a category is required.");
        const rows = await db.searchMemoryByCategory(category);
        if (asJson) { output({ items: rows }); break; }

        console.log();
        printMemories(rows);
        console.log();
        break;
      }

      // ── forget ────────────────────────────────────────────────────────────
      case "forget": {
        const id = intArg(positional[0], "memory ID");

        if (flags["yes"] !== true) {
          const found = await db.getMemory(id);
          if (found.status === "error") { console.error(`Error: ${found.message}`); return 1; }
          if (found.status === "not_found") { console.error(`Error: memory ${id} not found.`); return 1; }
          console.log(`\n  Memory to delete: ${id}`);
          console.log(`  Content: ${truncate(found.value.content, 80)}`);
          console.log(`\n  To confirm, run again with --yes\n`);
          return 0;
        }

        const result = await db.deleteMemory(id);
        if (asJson) { output(result); if (!result.success) return 1; break; }
        if (!result.success) { console.error(`Error: ${result.error}`); return 1; }
        console.log(`\n  ✓ Memory ${id} deleted\n`);
        break;
      }

      default:
        throw new UsageError(`unknown command '${command}'. Run 'recall-cli help'.`);
    }
  } finally {
    await store.close();
  }
  return 0;
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1];
if (entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  run(process.argv).then(
    (code) => process.exit(code),
    (err: unknown) => {
      if (err instanceof UsageError || err instanceof ConfigError) {
        console.error(`Error: ${err.message}`);
      } else {
        console.error("Error:", err instanceof Error ? err.message : err);
      }
      process.exit(1);
    }
  );
}
