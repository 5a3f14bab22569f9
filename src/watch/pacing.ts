// pattern: Functional Core
/**
 * Delay planning for a single feed.
 *
 * Pure functions; the poller feeds them the shared budget's view and its own
 * retry counters and sleeps for whatever they return.
 */

import type { RateBudget } from "./rate-budget";

export type PacingPolicy = {
  /** Delay between polls when the budget is healthy */
  readonly baseIntervalMs: number;
  /** Remaining-request count at or below which polling slows down */
  readonly lowBudgetFloor: number;
  /** Multiplier applied to the base interval below the floor */
  readonly lowBudgetMultiplier: number;
  /** First transient retry delay; doubles on each consecutive failure */
  readonly transientBaseMs: number;
  /** Consecutive transient failures tolerated before the feed gives up */
  readonly transientMaxRetries: number;
  /** Minimum wait after a rate-limited response */
  readonly rateLimitMinDelayMs: number;
  /** Upper bound for every delay this module produces */
  readonly maxDelayMs: number;
};

export type PacingInput = {
  readonly budget: RateBudget;
  readonly nowMs: number;
  /** Server-requested minimum interval (X-Poll-Interval), if any */
  readonly serverIntervalMs: number | null;
};

/**
 * Delay after a successful poll. New data never shortens it.
 *
 * - Never below the base interval or the server's requested interval
 * - Below the low-budget floor the interval is stretched by the multiplier
 * - With the budget exhausted and a known reset, waits out the window
 */
export function computePollDelay(policy: PacingPolicy, input: PacingInput): number {
  let delayMs = Math.max(policy.baseIntervalMs, input.serverIntervalMs ?? 0);

  if (input.budget.isBelowFloor(policy.lowBudgetFloor)) {
    delayMs *= policy.lowBudgetMultiplier;
  }

  if (input.budget.isExhausted()) {
    const untilReset = input.budget.msUntilReset(input.nowMs);
    if (untilReset !== null) {
      delayMs = Math.max(delayMs, untilReset);
    }
  }

  return Math.min(delayMs, policy.maxDelayMs);
}

export type RateLimitBackoffInput = {
  /** 1-based count of consecutive rate-limited responses */
  readonly attempt: number;
  /** Delay chosen for the previous consecutive rate-limited response */
  readonly previousDelayMs: number | null;
  readonly retryAfterMs: number | null;
  readonly resetAtMs: number | null;
  readonly budget: RateBudget;
  readonly nowMs: number;
};

/**
 * Delay after a rate-limited response.
 *
 * Honors retry-after and the reset time together (the later one wins) and
 * never waits less than the configured minimum. Without either hint the
 * minimum doubles per attempt. Consecutive delays never decrease until the
 * cap is reached.
 */
export function computeRateLimitDelay(
  policy: PacingPolicy,
  input: RateLimitBackoffInput,
): number {
  const candidates: number[] = [policy.rateLimitMinDelayMs];

  if (input.retryAfterMs !== null) {
    candidates.push(input.retryAfterMs);
  }

  const resetAtMs = input.resetAtMs ?? input.budget.snapshot().resetAtMs;
  if (resetAtMs !== null && resetAtMs > input.nowMs) {
    candidates.push(resetAtMs - input.nowMs);
  }

  const hinted = candidates.length > 1;
  const candidate = hinted
    ? Math.max(...candidates)
    : policy.rateLimitMinDelayMs * Math.pow(2, Math.max(0, input.attempt - 1));

  const nonDecreasing = Math.max(candidate, input.previousDelayMs ?? 0);
  return Math.min(nonDecreasing, policy.maxDelayMs);
}

export type TransientDecision =
  | { readonly giveUp: false; readonly delayMs: number }
  | { readonly giveUp: true };

/**
 * Delay after a transient failure, or the decision to escalate once the
 * consecutive failure count passes the retry limit.
 */
export function computeTransientDelay(policy: PacingPolicy, attempt: number): TransientDecision {
  if (attempt > policy.transientMaxRetries) {
    return { giveUp: true };
  }

  const delayMs = policy.transientBaseMs * Math.pow(2, Math.max(0, attempt - 1));
  return { giveUp: false, delayMs: Math.min(delayMs, policy.maxDelayMs) };
}
