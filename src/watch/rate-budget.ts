/**
 * Rate limit metadata as read from one response. Any field may be missing
 * when the corresponding header was absent.
 */
export type RateLimitSnapshot = {
  readonly remaining: number | null;
  readonly limit: number | null;
  readonly resetAtMs: number | null;
};

/**
 * Process-wide request allowance shared by every feed polled under one
 * credential. The remote service is the source of truth, so each response
 * simply overwrites what it reports (last writer wins).
 */
export type RateBudget = {
  readonly update: (snapshot: RateLimitSnapshot) => void;
  readonly snapshot: () => RateLimitSnapshot;
  readonly isBelowFloor: (floor: number) => boolean;
  readonly isExhausted: () => boolean;
  readonly msUntilReset: (nowMs: number) => number | null;
};

export function createRateBudget(initial?: Partial<RateLimitSnapshot>): RateBudget {
  let remaining: number | null = clampRemaining(initial?.remaining ?? null);
  let limit: number | null = initial?.limit ?? null;
  let resetAtMs: number | null = initial?.resetAtMs ?? null;

  return {
    update: (next) => {
      if (next.remaining !== null) remaining = clampRemaining(next.remaining);
      if (next.limit !== null) limit = next.limit;
      if (next.resetAtMs !== null) resetAtMs = next.resetAtMs;
    },
    snapshot: () => ({ remaining, limit, resetAtMs }),
    isBelowFloor: (floor) => remaining !== null && remaining <= floor,
    isExhausted: () => remaining === 0,
    msUntilReset: (nowMs) => (resetAtMs === null ? null : Math.max(0, resetAtMs - nowMs)),
  };
}

function clampRemaining(value: number | null): number | null {
  return value === null ? null : Math.max(0, value);
}

function parseHeaderNumber(headers: Headers, name: string): number | null {
  const value = headers.get(name);
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function readRateLimitHeaders(headers: Headers): RateLimitSnapshot {
  const resetSeconds = parseHeaderNumber(headers, "x-ratelimit-reset");
  return {
    remaining: parseHeaderNumber(headers, "x-ratelimit-remaining"),
    limit: parseHeaderNumber(headers, "x-ratelimit-limit"),
    resetAtMs: resetSeconds === null ? null : resetSeconds * 1000,
  };
}

export function readRetryAfterMs(headers: Headers): number | null {
  const seconds = parseHeaderNumber(headers, "retry-after");
  return seconds === null ? null : seconds * 1000;
}

export function readPollIntervalMs(headers: Headers): number | null {
  const seconds = parseHeaderNumber(headers, "x-poll-interval");
  return seconds === null ? null : seconds * 1000;
}
