// pattern: Functional Core
/**
 * Classification of failed responses into the three error kinds the poller
 * acts on.
 *
 * Follows the GitHub REST guidance on exceeding rate limits:
 * https://docs.github.com/en/rest/using-the-rest-api/rate-limits-for-the-rest-api#exceeding-the-rate-limit
 */

import type { FetchError } from "./types";
import type { RateLimitSnapshot } from "./rate-budget";

export type ErrorResponseDetails = {
  readonly status: number;
  readonly message: string | null;
  readonly rateLimit: RateLimitSnapshot;
  readonly retryAfterMs: number | null;
};

export type RateLimitKind = "primary" | "secondary" | "unknown";

export function classifyRateLimit(details: ErrorResponseDetails): RateLimitKind | null {
  if (details.status !== 403 && details.status !== 429) {
    return null;
  }

  const message = (details.message ?? "").toLowerCase();
  if (message.includes("secondary") || message.includes("abuse")) {
    return "secondary";
  }

  // "you will receive a 403 or 429 response, and the x-ratelimit-remaining header will be 0"
  if (details.rateLimit.remaining === 0) {
    return "primary";
  }

  if (details.status === 429 || details.retryAfterMs !== null) {
    return "unknown";
  }

  return null;
}

export function classifyErrorResponse(details: ErrorResponseDetails): FetchError {
  const describe = details.message
    ? `HTTP ${details.status}: ${details.message}`
    : `HTTP ${details.status}`;

  const rateLimitKind = classifyRateLimit(details);
  if (rateLimitKind) {
    return {
      kind: "rate-limited",
      message: `${describe} (${rateLimitKind} rate limit)`,
      retryAfterMs: details.retryAfterMs,
      resetAtMs: details.rateLimit.resetAtMs,
    };
  }

  if (details.status >= 500 || details.status === 408) {
    return { kind: "transient", message: describe, status: details.status };
  }

  // 401 bad credentials, 403 forbidden, 404 unknown repository, 410 gone, 422 ...
  return { kind: "fatal", message: describe, status: details.status };
}
