export type WatchedResource = {
  readonly owner: string;
  readonly name: string;
};

/**
 * Resumption token for one feed: the validator of the last response and the
 * id of the newest event already delivered. Both are null before anything
 * has been observed.
 */
export type FeedCursor = {
  readonly etag: string | null;
  readonly newestId: string | null;
};

export type FeedItem = {
  readonly id: string;
  readonly type: string;
  readonly actor: string;
  readonly repo: string;
  readonly createdAt: Date | null;
  readonly payload: Readonly<Record<string, unknown>>;
};

export type Page =
  | { readonly kind: "unchanged"; readonly cursor?: FeedCursor }
  | {
      readonly kind: "new-data";
      readonly items: ReadonlyArray<FeedItem>;
      readonly cursor: FeedCursor;
    };

export type FetchError =
  | {
      readonly kind: "rate-limited";
      readonly message: string;
      readonly retryAfterMs: number | null;
      readonly resetAtMs: number | null;
    }
  | { readonly kind: "transient"; readonly message: string; readonly status: number | null }
  | { readonly kind: "fatal"; readonly message: string; readonly status: number | null };

export type FetchOutcome =
  | {
      readonly success: true;
      readonly page: Page;
      readonly pollIntervalMs: number | null;
    }
  | { readonly success: false; readonly error: FetchError };

/**
 * `seed` reads only the newest page to establish a starting cursor. `poll`
 * follows older pages back to the cursor, whatever the cursor holds.
 */
export type FetchMode = "seed" | "poll";

export type PageFetcher = {
  readonly fetch: (
    resource: WatchedResource,
    cursor: FeedCursor,
    mode: FetchMode,
  ) => Promise<FetchOutcome>;
};

export type FeedNotice = {
  readonly kind: "no-new-events" | "new-events";
  readonly resource: WatchedResource;
  readonly count: number;
  readonly remaining: number | null;
  readonly at: Date;
};

/**
 * Consumer of delivered events. `deliver` must resolve before the poller
 * commits the batch's cursor; a rejection leaves the cursor where it was.
 */
export type FeedSink = {
  readonly deliver: (
    resource: WatchedResource,
    items: ReadonlyArray<FeedItem>,
  ) => Promise<void> | void;
  readonly notice: (notice: FeedNotice) => Promise<void> | void;
};

export type FeedExit =
  | { readonly resource: WatchedResource; readonly kind: "cancelled" }
  | {
      readonly resource: WatchedResource;
      readonly kind: "fatal";
      readonly error: FetchError;
    };

export function formatResource(resource: WatchedResource): string {
  return `${resource.owner}/${resource.name}`;
}
