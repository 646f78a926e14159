import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { ensureSchema } from "./schema.js";
import { StoreSetupError, StoreUnavailableError } from "./errors.js";

export type StoreState = "unopened" | "opened" | "closed";

type Slot =
  | { state: "unopened" }
  | { state: "opened"; db: Database.Database }
  | { state: "closed" };

const settle = (promise: Promise<unknown>): Promise<void> =>
  promise.then(
    () => undefined,
    () => undefined,
  );

/**
 * Single owner of the SQLite connection.
 *
 * Nothing touches the file system until the first `withStore()` call, so the
 * MCP handshake never waits on disk or schema work. Every caller is queued on
 * one promise chain; the open + schema step runs inside the same critical
 * section as the first caller's work, so it happens at most once.
 */
export class StoreHandle {
  /** Absolute path to the SQLite file, or ':memory:' for in-memory databases. */
  readonly dbPath: string;

  private slot: Slot = { state: "unopened" };
  private tail: Promise<void> = Promise.resolve();

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  get state(): StoreState {
    return this.slot.state;
  }

  /**
   * Run `operation` with exclusive access to the connection. The callback is
   * synchronous: it runs to completion while holding the lock.
   */
  withStore<T>(operation: (db: Database.Database) => T): Promise<T> {
    return this.enqueue(() => operation(this.acquire()));
  }

  /** Wait for queued work, then close the connection for good. */
  close(): Promise<void> {
    return this.enqueue(() => {
      if (this.slot.state === "opened") {
        const { db } = this.slot;
        this.slot = { state: "closed" };
        try {
          // Refresh planner statistics, FTS5 tables included
          db.pragma("optimize");
        } finally {
          db.close();
        }
        return;
      }
      this.slot = { state: "closed" };
    });
  }

  private enqueue<T>(work: () => T): Promise<T> {
    const next = this.tail.then(work);
    // Keep the chain alive even when the operation fails.
    this.tail = settle(next);
    return next;
  }

  private acquire(): Database.Database {
    switch (this.slot.state) {
      case "opened":
        return this.slot.db;
      case "closed":
        throw new StoreUnavailableError(this.dbPath);
      case "unopened": {
        const db = this.open();
        this.slot = { state: "opened", db };
        return db;
      }
    }
  }

  private open(): Database.Database {
    let db: Database.Database;
    try {
      if (this.dbPath !== ":memory:") {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      db = new Database(this.dbPath);
    } catch (err) {
      throw new StoreSetupError("open database", err);
    }

    try {
      try {
        // Switches the chat application's file to WAL; the mode persists after exit
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = NORMAL");
        // The chat application writes conversations into the same file
        db.pragma("busy_timeout = 5000");
      } catch (err) {
        throw new StoreSetupError("connection pragmas", err);
      }
      ensureSchema(db);
    } catch (err) {
      // Leave the handle unopened so a later call can retry from scratch
      db.close();
      throw err;
    }
    return db;
  }
}
