// pattern: Imperative Shell
import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { feedCursors } from "../db/schema";
import { resourceKey } from "./cursor";
import type { FeedCursor, WatchedResource } from "./types";

/**
 * Keeps the last committed cursor of every feed so a restarted watcher
 * resumes where it stopped instead of seeding from scratch.
 */
export type CursorStore = {
  readonly load: (resource: WatchedResource) => FeedCursor | null;
  readonly save: (resource: WatchedResource, cursor: FeedCursor) => void;
};

export function createSqliteCursorStore(db: AppDatabase): CursorStore {
  return {
    load: (resource) => {
      const row = db
        .select({ etag: feedCursors.etag, newestId: feedCursors.newestId })
        .from(feedCursors)
        .where(eq(feedCursors.resource, resourceKey(resource)))
        .get();

      return row ? { etag: row.etag, newestId: row.newestId } : null;
    },

    save: (resource, cursor) => {
      const updatedAt = new Date();
      db.insert(feedCursors)
        .values({
          resource: resourceKey(resource),
          etag: cursor.etag,
          newestId: cursor.newestId,
          updatedAt,
        })
        .onConflictDoUpdate({
          target: feedCursors.resource,
          set: { etag: cursor.etag, newestId: cursor.newestId, updatedAt },
        })
        .run();
    },
  };
}

export function createMemoryCursorStore(): CursorStore {
  const cursors = new Map<string, FeedCursor>();

  return {
    load: (resource) => cursors.get(resourceKey(resource)) ?? null,
    save: (resource, cursor) => {
      cursors.set(resourceKey(resource), cursor);
    },
  };
}
