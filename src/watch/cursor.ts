// pattern: Functional Core
import type { FeedCursor, WatchedResource } from "./types";

const RESOURCE_PATTERN = /^[A-Za-z0-9-]+\/[A-Za-z0-9._-]+$/;

export const EMPTY_CURSOR: FeedCursor = { etag: null, newestId: null };

/**
 * Orders event ids numerically. Ids are decimal strings that can exceed
 * Number.MAX_SAFE_INTEGER, so they are compared as BigInt. A null id sorts
 * before every real id.
 */
export function compareEventIds(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;

  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Returns true when an event with this id is already covered by the cursor.
 */
export function isSeen(cursor: FeedCursor, eventId: string): boolean {
  return compareEventIds(eventId, cursor.newestId) <= 0;
}

/**
 * Moves the cursor forward to the candidate. The newest-id boundary never
 * goes backwards: a candidate that points at an older event keeps the
 * current boundary but still takes the candidate's etag.
 */
export function advanceCursor(current: FeedCursor, candidate: FeedCursor): FeedCursor {
  if (compareEventIds(candidate.newestId, current.newestId) >= 0) {
    return candidate;
  }
  return { etag: candidate.etag, newestId: current.newestId };
}

export type ParseResourceResult =
  | { readonly success: true; readonly resource: WatchedResource }
  | { readonly success: false; readonly error: string };

export function parseResource(raw: string): ParseResourceResult {
  const trimmed = raw.trim();
  if (!RESOURCE_PATTERN.test(trimmed)) {
    return {
      success: false,
      error: `"${raw}" is not in owner/repo format`,
    };
  }

  const [owner, name] = trimmed.split("/");
  if (!owner || !name) {
    return { success: false, error: `"${raw}" is not in owner/repo format` };
  }

  return { success: true, resource: { owner, name } };
}

export function resourceKey(resource: WatchedResource): string {
  return `${resource.owner}/${resource.name}`.toLowerCase();
}
