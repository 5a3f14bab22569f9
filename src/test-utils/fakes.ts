import { vi } from "vitest";
import type { PacingPolicy } from "../watch/pacing";
import type {
  FeedCursor,
  FeedItem,
  FeedNotice,
  FeedSink,
  FetchError,
  FetchMode,
  FetchOutcome,
  PageFetcher,
  WatchedResource,
} from "../watch/types";

export const TEST_POLICY: PacingPolicy = {
  baseIntervalMs: 60_000,
  lowBudgetFloor: 50,
  lowBudgetMultiplier: 4,
  transientBaseMs: 2_000,
  transientMaxRetries: 3,
  rateLimitMinDelayMs: 60_000,
  maxDelayMs: 600_000,
};

export function makeResource(slug: string): WatchedResource {
  const [owner = "octo-org", name = "repo"] = slug.split("/");
  return { owner, name };
}

export function makeItem(id: number | string, overrides: Partial<FeedItem> = {}): FeedItem {
  return {
    id: String(id),
    type: "WatchEvent",
    actor: "octocat",
    repo: "octo-org/repo",
    createdAt: null,
    payload: {},
    ...overrides,
  };
}

export function newData(ids: ReadonlyArray<number>, etag: string | null = null): FetchOutcome {
  const items = ids.map((id) => makeItem(id));
  const newest = ids.length > 0 ? String(Math.max(...ids)) : null;
  return {
    success: true,
    page: { kind: "new-data", items, cursor: { etag, newestId: newest } },
    pollIntervalMs: null,
  };
}

export function unchanged(cursor?: FeedCursor): FetchOutcome {
  return {
    success: true,
    page: cursor ? { kind: "unchanged", cursor } : { kind: "unchanged" },
    pollIntervalMs: null,
  };
}

export function failure(error: FetchError): FetchOutcome {
  return { success: false, error };
}

export const FATAL: FetchError = { kind: "fatal", message: "HTTP 404: Not Found", status: 404 };
export const TRANSIENT: FetchError = { kind: "transient", message: "HTTP 502", status: 502 };
export const RATE_LIMITED: FetchError = {
  kind: "rate-limited",
  message: "HTTP 429 (unknown rate limit)",
  retryAfterMs: null,
  resetAtMs: null,
};

export type ScriptedFetcher = PageFetcher & {
  readonly calls: Array<{ resource: WatchedResource; cursor: FeedCursor; mode: FetchMode }>;
};

/**
 * Fetcher that replays the given outcomes in order and then keeps
 * returning the fallback (unchanged by default).
 */
export function createScriptedFetcher(
  outcomes: ReadonlyArray<FetchOutcome>,
  fallback: FetchOutcome = unchanged(),
): ScriptedFetcher {
  const queue = [...outcomes];
  const calls: Array<{ resource: WatchedResource; cursor: FeedCursor; mode: FetchMode }> = [];

  return {
    calls,
    fetch: async (resource, cursor, mode) => {
      calls.push({ resource, cursor, mode });
      return queue.shift() ?? fallback;
    },
  };
}

export type RecordingSink = FeedSink & {
  readonly delivered: Array<{ resource: WatchedResource; ids: string[] }>;
  readonly notices: FeedNotice[];
  readonly deliveredIds: () => string[];
};

export function createRecordingSink(): RecordingSink {
  const delivered: Array<{ resource: WatchedResource; ids: string[] }> = [];
  const notices: FeedNotice[] = [];

  return {
    delivered,
    notices,
    deliveredIds: () => delivered.flatMap((batch) => batch.ids),
    deliver: vi.fn((resource: WatchedResource, items: ReadonlyArray<FeedItem>) => {
      delivered.push({ resource, ids: items.map((item) => item.id) });
    }),
    notice: vi.fn((notice: FeedNotice) => {
      notices.push(notice);
    }),
  };
}
