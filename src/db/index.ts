// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { and, desc, eq } from "drizzle-orm";
import { StorageError, errorMessage } from "../errors";
import * as schema from "./schema";
import { history } from "./schema";
import type { HistoryRecord } from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export const MEMORY_PATH = ":memory:";

/**
 * Opens (or creates) the SQLite file at `dbPath` and makes sure the history
 * schema exists. Any failure, including a file that is not a database,
 * surfaces as a StorageError.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  let sqlite: Database.Database;
  try {
    if (dbPath !== MEMORY_PATH) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    sqlite = new Database(dbPath);
  } catch (err) {
    throw new StorageError(
      `unable to open history database: ${errorMessage(err)}`,
      dbPath,
    );
  }

  try {
    sqlite.pragma("journal_mode = WAL");
    sqlite.exec(schema.HISTORY_DDL);
  } catch (err) {
    sqlite.close();
    throw new StorageError(
      `unable to initialise history database: ${errorMessage(err)}`,
      dbPath,
    );
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type HistoryListOptions = {
  readonly feed?: string;
  readonly limit: number;
};

/**
 * Append-only record of which (feed, title) pairs have been downloaded.
 */
export type HistoryStore = {
  readonly has: (feed: string, title: string) => Date | null;
  readonly record: (feed: string, url: string, title: string) => void;
  readonly list: (options: HistoryListOptions) => ReadonlyArray<HistoryRecord>;
  readonly close: () => void;
};

export function openHistoryStore(
  dbPath: string,
  now: () => Date = () => new Date(),
): HistoryStore {
  const { db, close } = createDatabase(dbPath);
  let closed = false;

  return {
    has(feed, title) {
      const row = db
        .select({ date: history.date })
        .from(history)
        .where(and(eq(history.feed, feed), eq(history.title, title)))
        .orderBy(desc(history.date), desc(history.id))
        .limit(1)
        .get();

      return row ? row.date : null;
    },

    // better-sqlite3 runs each statement in its own implicit transaction,
    // so the row is committed once run() returns.
    record(feed, url, title) {
      db.insert(history).values({ date: now(), feed, url, title }).run();
    },

    list({ feed, limit }) {
      return db
        .select()
        .from(history)
        .where(feed ? eq(history.feed, feed) : undefined)
        .orderBy(desc(history.date), desc(history.id))
        .limit(limit)
        .all();
    },

    close() {
      if (closed) return;
      closed = true;
      close();
    },
  };
}

export type { HistoryRecord };
