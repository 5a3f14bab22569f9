import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const feedCursors = sqliteTable("feed_cursors", {
  resource: text("resource").primaryKey(),
  etag: text("etag"),
  newestId: text("newest_id"),
  updatedAt: integer("updated_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});
