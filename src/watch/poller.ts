// pattern: Imperative Shell
import type { Logger } from "pino";
import { EMPTY_CURSOR, advanceCursor } from "./cursor";
import { dropSeenItems } from "./dedup";
import { computePollDelay, computeRateLimitDelay, computeTransientDelay } from "./pacing";
import type { PacingPolicy } from "./pacing";
import type { RateBudget } from "./rate-budget";
import { sleep } from "./sleep";
import type {
  FeedCursor,
  FeedExit,
  FeedNotice,
  FeedSink,
  FetchError,
  FetchMode,
  FetchOutcome,
  PageFetcher,
  WatchedResource,
} from "./types";
import { formatResource } from "./types";

export type PollerState = "idle" | "polling" | "stopped";

/**
 * Outcome of one poll iteration.
 *
 * - `polled`: the fetch succeeded (and any new events were delivered)
 * - `retry`: a rate-limited or transient failure; nothing was committed
 * - `stop`: a fatal failure; the feed is finished
 */
export type PollStep =
  | { readonly kind: "polled"; readonly delayMs: number; readonly delivered: number }
  | { readonly kind: "retry"; readonly delayMs: number; readonly error: FetchError }
  | { readonly kind: "stop"; readonly error: FetchError };

type FailureStep = Extract<PollStep, { readonly kind: "retry" | "stop" }>;

type SeedStep =
  | { readonly kind: "seeded"; readonly delayMs: number; readonly backlog: number }
  | FailureStep;

export type SeedResult =
  | { readonly kind: "seeded"; readonly delayMs: number; readonly backlog: number }
  | { readonly kind: "exited"; readonly exit: FeedExit };

export type FeedPollerDeps = {
  readonly resource: WatchedResource;
  readonly fetcher: PageFetcher;
  readonly sink: FeedSink;
  readonly budget: RateBudget;
  readonly policy: PacingPolicy;
  readonly logger: Logger;
  /** Cursor to resume from; defaults to the empty cursor */
  readonly initialCursor?: FeedCursor;
  /** Called with every cursor the poller commits */
  readonly onCommit?: (cursor: FeedCursor) => void;
  readonly now?: () => number;
};

export type FeedPoller = {
  readonly resource: WatchedResource;
  readonly state: () => PollerState;
  readonly cursor: () => FeedCursor;
  /** One fetch, emit and commit cycle, emitting new events to the sink */
  readonly step: () => Promise<PollStep>;
  /** Polls until the first successful page and adopts it without emitting */
  readonly seed: (signal: AbortSignal) => Promise<SeedResult>;
  /** Polls until the signal aborts or a fatal error, sleeping between polls */
  readonly run: (signal: AbortSignal, initialDelayMs?: number) => Promise<FeedExit>;
};

/**
 * Creates the state machine that watches one feed.
 *
 * Within a feed, fetch, emit and commit run strictly in sequence and never
 * overlap the next fetch. The cursor moves only after the sink has accepted
 * a batch, so a failed delivery is retried from the same cursor instead of
 * losing the batch.
 */
export function createFeedPoller(deps: FeedPollerDeps): FeedPoller {
  const feed = formatResource(deps.resource);
  const now = deps.now ?? (() => Date.now());

  let state: PollerState = "idle";
  let cursor: FeedCursor = deps.initialCursor ?? EMPTY_CURSOR;
  let transientAttempts = 0;
  let rateLimitAttempts = 0;
  let previousRateLimitDelayMs: number | null = null;

  function commit(next: FeedCursor): void {
    cursor = advanceCursor(cursor, next);
    if (!deps.onCommit) return;

    try {
      deps.onCommit(cursor);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ feed, error: message }, "failed to persist cursor");
    }
  }

  async function sendNotice(kind: FeedNotice["kind"], count: number): Promise<void> {
    try {
      await deps.sink.notice({
        kind,
        resource: deps.resource,
        count,
        remaining: deps.budget.snapshot().remaining,
        at: new Date(now()),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.warn({ feed, error: message }, "sink rejected notice");
    }
  }

  function pollDelay(outcome: Extract<FetchOutcome, { success: true }>): number {
    return computePollDelay(deps.policy, {
      budget: deps.budget,
      nowMs: now(),
      serverIntervalMs: outcome.pollIntervalMs,
    });
  }

  function resetBackoff(): void {
    transientAttempts = 0;
    rateLimitAttempts = 0;
    previousRateLimitDelayMs = null;
  }

  function handleFailure(error: FetchError): FailureStep {
    switch (error.kind) {
      case "fatal":
        return { kind: "stop", error };

      case "rate-limited": {
        rateLimitAttempts++;
        const delayMs = computeRateLimitDelay(deps.policy, {
          attempt: rateLimitAttempts,
          previousDelayMs: previousRateLimitDelayMs,
          retryAfterMs: error.retryAfterMs,
          resetAtMs: error.resetAtMs,
          budget: deps.budget,
          nowMs: now(),
        });
        previousRateLimitDelayMs = delayMs;
        deps.logger.warn(
          { feed, error: error.message, attempt: rateLimitAttempts, delayMs },
          "rate limited, backing off",
        );
        return { kind: "retry", delayMs, error };
      }

      case "transient": {
        transientAttempts++;
        const decision = computeTransientDelay(deps.policy, transientAttempts);
        if (decision.giveUp) {
          return {
            kind: "stop",
            error: {
              kind: "fatal",
              message: `giving up after ${transientAttempts} consecutive failures: ${error.message}`,
              status: error.status,
            },
          };
        }
        deps.logger.warn(
          { feed, error: error.message, attempt: transientAttempts, delayMs: decision.delayMs },
          "transient failure, retrying",
        );
        return { kind: "retry", delayMs: decision.delayMs, error };
      }
    }
  }

  async function fetchPage(mode: FetchMode): Promise<FetchOutcome> {
    state = "polling";
    try {
      return await deps.fetcher.fetch(deps.resource, cursor, mode);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, error: { kind: "transient", message, status: null } };
    } finally {
      state = "idle";
    }
  }

  async function step(): Promise<PollStep> {
    const outcome = await fetchPage("poll");
    if (!outcome.success) return handleFailure(outcome.error);

    const page = outcome.page;

    if (page.kind === "unchanged") {
      if (page.cursor) commit(page.cursor);
      resetBackoff();
      deps.logger.debug({ feed }, "no new events");
      await sendNotice("no-new-events", 0);
      return { kind: "polled", delayMs: pollDelay(outcome), delivered: 0 };
    }

    const { fresh, skippedCount } = dropSeenItems(cursor, page.items);
    if (skippedCount > 0) {
      deps.logger.debug({ feed, skippedCount }, "dropped already delivered events");
    }

    if (fresh.length === 0) {
      commit(page.cursor);
      resetBackoff();
      await sendNotice("no-new-events", 0);
      return { kind: "polled", delayMs: pollDelay(outcome), delivered: 0 };
    }

    try {
      await deps.sink.deliver(deps.resource, fresh);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return handleFailure({
        kind: "transient",
        message: `sink rejected delivery: ${message}`,
        status: null,
      });
    }

    commit(page.cursor);
    resetBackoff();
    deps.logger.info({ feed, count: fresh.length, newestId: cursor.newestId }, "new events delivered");
    await sendNotice("new-events", fresh.length);
    return { kind: "polled", delayMs: pollDelay(outcome), delivered: fresh.length };
  }

  async function seedStep(): Promise<SeedStep> {
    const outcome = await fetchPage("seed");
    if (!outcome.success) return handleFailure(outcome.error);

    const page = outcome.page;
    const backlog = page.kind === "new-data" ? page.items.length : 0;
    if (page.cursor) commit(page.cursor);
    resetBackoff();

    return { kind: "seeded", delayMs: pollDelay(outcome), backlog };
  }

  function stopWith(error: FetchError): FeedExit {
    state = "stopped";
    return { resource: deps.resource, kind: "fatal", error };
  }

  function cancelled(): FeedExit {
    state = "stopped";
    return { resource: deps.resource, kind: "cancelled" };
  }

  return {
    resource: deps.resource,
    state: () => state,
    cursor: () => cursor,
    step,

    seed: async (signal) => {
      while (!signal.aborted) {
        const result = await seedStep();

        if (result.kind === "stop") {
          return { kind: "exited", exit: stopWith(result.error) };
        }

        if (result.kind === "seeded") {
          deps.logger.info(
            { feed, backlog: result.backlog, newestId: cursor.newestId },
            "feed seeded, backlog skipped",
          );
          return result;
        }

        const completed = await sleep(result.delayMs, signal);
        if (!completed) break;
      }

      return { kind: "exited", exit: cancelled() };
    },

    run: async (signal, initialDelayMs = 0) => {
      if (initialDelayMs > 0) {
        const completed = await sleep(initialDelayMs, signal);
        if (!completed) return cancelled();
      }

      while (!signal.aborted) {
        const result = await step();
        if (result.kind === "stop") {
          return stopWith(result.error);
        }

        const completed = await sleep(result.delayMs, signal);
        if (!completed) break;
      }

      return cancelled();
    },
  };
}
