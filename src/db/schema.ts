import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// ---------- Tables ----------

export const history = sqliteTable(
  "history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    date: integer("date", { mode: "timestamp_ms" }).notNull(),
    feed: text("feed").notNull(),
    url: text("url").notNull(),
    title: text("title").notNull(),
  },
  (table) => ({
    feedTitleIdx: index("history_feed_title_idx").on(table.feed, table.title),
  }),
);

export type HistoryRecord = typeof history.$inferSelect;

/**
 * DDL matching the `history` table above. Executed on every open, so each
 * statement must be idempotent.
 */
export const HISTORY_DDL = `
CREATE TABLE IF NOT EXISTS history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  date INTEGER NOT NULL,
  feed TEXT NOT NULL,
  url TEXT NOT NULL,
  title TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS history_feed_title_idx ON history(feed, title);
`;
