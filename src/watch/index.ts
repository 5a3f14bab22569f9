export { createWatchSupervisor } from "./supervisor";
export type { SupervisorDeps, SupervisorResult, WatchSupervisor } from "./supervisor";
export { createFeedPoller } from "./poller";
export type { FeedPoller, FeedPollerDeps, PollStep, PollerState, SeedResult } from "./poller";
export { createGitHubFetcher } from "./github";
export type { GitHubFetcherOptions } from "./github";
export { createRateBudget } from "./rate-budget";
export type { RateBudget, RateLimitSnapshot } from "./rate-budget";
export { createSqliteCursorStore, createMemoryCursorStore } from "./cursor-store";
export type { CursorStore } from "./cursor-store";
export { EMPTY_CURSOR, advanceCursor, compareEventIds, parseResource } from "./cursor";
export type { PacingPolicy } from "./pacing";
export type {
  FeedCursor,
  FeedExit,
  FeedItem,
  FeedNotice,
  FeedSink,
  FetchError,
  FetchOutcome,
  Page,
  PageFetcher,
  WatchedResource,
} from "./types";
export { formatResource } from "./types";
