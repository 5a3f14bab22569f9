// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import { compareEventIds, isSeen } from "./cursor";
import { dropSeenItems } from "./dedup";
import { classifyErrorResponse } from "./rate-limit";
import type { RateBudget } from "./rate-budget";
import { readPollIntervalMs, readRateLimitHeaders, readRetryAfterMs } from "./rate-budget";
import type {
  FeedCursor,
  FeedItem,
  FetchError,
  FetchMode,
  FetchOutcome,
  PageFetcher,
  WatchedResource,
} from "./types";
import { formatResource } from "./types";

const API_VERSION = "2022-11-28";

export type GitHubFetcherOptions = {
  readonly apiUrl: string;
  readonly userAgent: string;
  readonly perPage: number;
  readonly maxPages: number;
  readonly requestTimeoutMs: number;
  /** Omitted for unauthenticated requests */
  readonly token: string | null;
};

const eventSchema = z.object({
  id: z.string().regex(/^\d+$/),
  type: z.string().nullable().optional(),
  actor: z.object({ login: z.string() }),
  repo: z.object({ name: z.string() }),
  payload: z.record(z.string(), z.unknown()).optional(),
  created_at: z.string().nullable().optional(),
});

const eventIdSchema = z.object({ id: z.union([z.string(), z.number()]) });

type RequestResult =
  | {
      readonly success: true;
      readonly notModified: boolean;
      readonly etag: string | null;
      readonly next: string | null;
      readonly events: ReadonlyArray<FeedItem>;
      readonly pollIntervalMs: number | null;
    }
  | { readonly success: false; readonly error: FetchError };

/**
 * Creates a PageFetcher for the repository events API.
 *
 * The first page is requested conditionally with the cursor's etag so an
 * idle feed costs a 304. When every event on a page is unseen, older pages
 * are followed through the Link header (up to maxPages) so nothing between
 * the cursor and the newest event is skipped. Every response, success or
 * not, refreshes the shared budget from its rate limit headers.
 */
export function createGitHubFetcher(
  options: GitHubFetcherOptions,
  budget: RateBudget,
  logger: Logger,
): PageFetcher {
  async function request(url: string, etag: string | null): Promise<RequestResult> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "User-Agent": options.userAgent,
      "X-GitHub-Api-Version": API_VERSION,
    };
    if (options.token) headers["Authorization"] = `Bearer ${options.token}`;
    if (etag) headers["If-None-Match"] = etag;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(options.requestTimeoutMs),
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const message =
        error.name === "TimeoutError" || error.name === "AbortError"
          ? `request timeout: no response within ${options.requestTimeoutMs}ms`
          : `network error: ${error.message}`;
      return { success: false, error: { kind: "transient", message, status: null } };
    }

    const rateLimit = readRateLimitHeaders(response.headers);
    budget.update(rateLimit);
    const pollIntervalMs = readPollIntervalMs(response.headers);

    if (response.status === 304) {
      return {
        success: true,
        notModified: true,
        etag,
        next: null,
        events: [],
        pollIntervalMs,
      };
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      return {
        success: false,
        error: classifyErrorResponse({
          status: response.status,
          message,
          rateLimit,
          retryAfterMs: readRetryAfterMs(response.headers),
        }),
      };
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        success: false,
        error: { kind: "transient", message: `unreadable response body: ${message}`, status: response.status },
      };
    }

    if (!Array.isArray(raw)) {
      return {
        success: false,
        error: { kind: "transient", message: "response body is not an event list", status: response.status },
      };
    }

    return {
      success: true,
      notModified: false,
      etag: response.headers.get("etag") ?? etag,
      next: parseNextLink(response.headers.get("link")),
      events: parseEvents(raw, logger),
      pollIntervalMs,
    };
  }

  return {
    fetch: async (
      resource: WatchedResource,
      cursor: FeedCursor,
      mode: FetchMode,
    ): Promise<FetchOutcome> => {
      const feed = formatResource(resource);
      const url =
        `${options.apiUrl.replace(/\/+$/, "")}/repos/` +
        `${encodeURIComponent(resource.owner)}/${encodeURIComponent(resource.name)}` +
        `/events?per_page=${options.perPage}`;

      const first = await request(url, cursor.etag);
      if (!first.success) return first;

      if (first.notModified) {
        logger.debug({ feed }, "feed not modified");
        return { success: true, page: { kind: "unchanged" }, pollIntervalMs: first.pollIntervalMs };
      }

      const collected: FeedItem[] = [...first.events];
      let lastPage: ReadonlyArray<FeedItem> = first.events;
      let next = first.next;
      let pages = 1;

      // Seeding only needs the newest id, so older pages are never read for it.
      // A feed seeded while empty still has a null newestId and must paginate.
      const followPages = mode === "poll";

      while (
        followPages &&
        next !== null &&
        lastPage.length > 0 &&
        lastPage.every((item) => !isSeen(cursor, item.id))
      ) {
        if (pages >= options.maxPages) {
          logger.warn(
            { feed, pages, newestSeen: cursor.newestId },
            "page limit reached before the cursor, older events skipped",
          );
          break;
        }

        const older = await request(next, null);
        if (!older.success) return older;

        collected.push(...older.events);
        lastPage = older.events;
        next = older.next;
        pages++;
      }

      const { fresh, skippedCount } = dropSeenItems(cursor, collected);
      const etag = first.etag;

      logger.debug({ feed, pages, fresh: fresh.length, skipped: skippedCount }, "feed fetched");

      if (fresh.length === 0) {
        return {
          success: true,
          page: { kind: "unchanged", cursor: { etag, newestId: cursor.newestId } },
          pollIntervalMs: first.pollIntervalMs,
        };
      }

      // The API lists newest first; deliveries go oldest first.
      const items = [...fresh].reverse();
      const newestId = items.reduce<string | null>(
        (newest, item) => (compareEventIds(item.id, newest) > 0 ? item.id : newest),
        cursor.newestId,
      );

      return {
        success: true,
        page: { kind: "new-data", items, cursor: { etag, newestId } },
        pollIntervalMs: first.pollIntervalMs,
      };
    },
  };
}

/**
 * Maps raw events to FeedItems. Entries that do not look like events are
 * skipped instead of failing the whole page; the page cursor still moves
 * past them, so each skip is logged as a warning.
 */
export function parseEvents(raw: ReadonlyArray<unknown>, logger: Logger): Array<FeedItem> {
  const items: FeedItem[] = [];

  for (const entry of raw) {
    const result = eventSchema.safeParse(entry);
    if (!result.success) {
      const idResult = eventIdSchema.safeParse(entry);
      logger.warn(
        {
          eventId: idResult.success ? String(idResult.data.id) : null,
          issues: result.error.issues.map((issue) => issue.path.join(".")),
        },
        "skipping malformed event",
      );
      continue;
    }

    const event = result.data;
    items.push({
      id: event.id,
      type: event.type ?? "UnknownEvent",
      actor: event.actor.login,
      repo: event.repo.name,
      createdAt: event.created_at ? new Date(event.created_at) : null,
      payload: event.payload ?? {},
    });
  }

  return items;
}

export function parseNextLink(header: string | null): string | null {
  if (!header) return null;

  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match && match[1]) {
      return match[1];
    }
  }

  return null;
}

async function readErrorMessage(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = (await response.text()).trim();
  } catch {
    return null;
  }
  if (!text) return null;

  try {
    const parsed: unknown = JSON.parse(text);
    const result = z.object({ message: z.string() }).safeParse(parsed);
    return result.success ? result.data.message : text;
  } catch {
    return text;
  }
}
