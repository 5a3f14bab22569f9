// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS feed_cursors (
  resource TEXT PRIMARY KEY NOT NULL,
  etag TEXT,
  newest_id TEXT,
  updated_at INTEGER NOT NULL DEFAULT (unixepoch())
);
`;

export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");
  sqlite.exec(CREATE_TABLES);

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
