// pattern: Functional Core
import { isSeen } from "./cursor";
import type { FeedCursor, FeedItem } from "./types";

export type DedupResult = {
  readonly fresh: ReadonlyArray<FeedItem>;
  readonly skippedCount: number;
};

/**
 * Drops events the cursor already covers and repeated ids, keeping the
 * order of the first occurrence. Overlapping pages can hand back the
 * boundary event a second time; it is removed here rather than delivered.
 */
export function dropSeenItems(
  cursor: FeedCursor,
  items: ReadonlyArray<FeedItem>,
): DedupResult {
  const seenIds = new Set<string>();
  const fresh: FeedItem[] = [];
  let skippedCount = 0;

  for (const item of items) {
    if (seenIds.has(item.id) || isSeen(cursor, item.id)) {
      skippedCount++;
      continue;
    }

    seenIds.add(item.id);
    fresh.push(item);
  }

  return { fresh, skippedCount };
}
