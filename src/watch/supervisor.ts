// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import { resourceKey } from "./cursor";
import type { CursorStore } from "./cursor-store";
import type { PacingPolicy } from "./pacing";
import { createFeedPoller } from "./poller";
import type { RateBudget } from "./rate-budget";
import type { FeedExit, FeedSink, PageFetcher, WatchedResource } from "./types";
import { formatResource } from "./types";

export type SupervisorDeps = {
  readonly fetcher: PageFetcher;
  readonly budget: RateBudget;
  readonly policy: PacingPolicy;
  readonly cursorStore: CursorStore;
  /** How many feeds may seed at the same time */
  readonly seedConcurrency: number;
  readonly logger: Logger;
  readonly now?: () => number;
};

export type SupervisorResult = {
  /** `failed` when every feed ended on a fatal error */
  readonly status: "stopped" | "failed";
  readonly exits: ReadonlyArray<FeedExit>;
};

export type WatchSupervisor = {
  readonly run: (
    resources: ReadonlyArray<WatchedResource>,
    sink: FeedSink,
  ) => Promise<SupervisorResult>;
  /**
   * Asks every feed of the current run to exit once its in-flight fetch has
   * completed. A later `run` starts afresh.
   */
  readonly stop: () => void;
  readonly activeFeeds: () => number;
};

/**
 * Creates the supervisor that runs one poller per watched feed.
 *
 * Feeds without a stored cursor are seeded first: their current history is
 * adopted as seen without reaching the sink. A fatal error ends only the
 * feed it happened on; `run` resolves once every feed has exited.
 */
export function createWatchSupervisor(deps: SupervisorDeps): WatchSupervisor {
  let controller: AbortController | null = null;
  let running = false;
  let active = 0;

  async function watchFeed(
    resource: WatchedResource,
    sink: FeedSink,
    seedLimit: ReturnType<typeof pLimit>,
    signal: AbortSignal,
  ): Promise<FeedExit> {
    const feed = formatResource(resource);
    const stored = deps.cursorStore.load(resource);

    const poller = createFeedPoller({
      resource,
      fetcher: deps.fetcher,
      sink,
      budget: deps.budget,
      policy: deps.policy,
      logger: deps.logger,
      initialCursor: stored ?? undefined,
      onCommit: (cursor) => deps.cursorStore.save(resource, cursor),
      now: deps.now,
    });

    let initialDelayMs = 0;
    if (stored) {
      deps.logger.info({ feed, newestId: stored.newestId }, "resuming feed from stored cursor");
    } else {
      const seeded = await seedLimit(() => poller.seed(signal));
      if (seeded.kind === "exited") return seeded.exit;
      initialDelayMs = seeded.delayMs;
    }

    deps.logger.info({ feed }, "listening for events");
    return poller.run(signal, initialDelayMs);
  }

  return {
    run: async (resources, sink) => {
      if (running) {
        throw new Error("supervisor is already running");
      }
      running = true;
      const runController = new AbortController();
      controller = runController;

      const unique = new Map<string, WatchedResource>();
      for (const resource of resources) {
        const key = resourceKey(resource);
        if (!unique.has(key)) unique.set(key, resource);
      }

      const feeds = [...unique.values()];
      const seedLimit = pLimit(Math.max(1, deps.seedConcurrency));
      active = feeds.length;

      deps.logger.info({ feeds: feeds.map(formatResource) }, "watch starting");

      const exits = await Promise.all(
        feeds.map(async (resource): Promise<FeedExit> => {
          let exit: FeedExit;
          try {
            exit = await watchFeed(resource, sink, seedLimit, runController.signal);
          } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            exit = { resource, kind: "fatal", error: { kind: "fatal", message, status: null } };
          }

          active--;
          if (exit.kind === "fatal") {
            deps.logger.error(
              { feed: formatResource(resource), error: exit.error.message, activeFeeds: active },
              "feed failed",
            );
          }
          return exit;
        }),
      );

      running = false;
      controller = null;
      const failed = exits.length > 0 && exits.every((exit) => exit.kind === "fatal");
      deps.logger.info(
        {
          cancelled: exits.filter((exit) => exit.kind === "cancelled").length,
          failed: exits.filter((exit) => exit.kind === "fatal").length,
        },
        "watch finished",
      );

      return { status: failed ? "failed" : "stopped", exits };
    },

    stop: () => {
      if (!controller || controller.signal.aborted) return;
      deps.logger.info({ activeFeeds: active }, "stopping feeds");
      controller.abort();
    },

    activeFeeds: () => active,
  };
}
