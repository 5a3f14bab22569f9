import { describe, it, expect } from "vitest";
import {
  createRateBudget,
  readPollIntervalMs,
  readRateLimitHeaders,
  readRetryAfterMs,
} from "./rate-budget";

describe("createRateBudget", () => {
  it("should start with nothing known", () => {
    const budget = createRateBudget();
    expect(budget.snapshot()).toEqual({ remaining: null, limit: null, resetAtMs: null });
    expect(budget.isBelowFloor(10)).toBe(false);
    expect(budget.isExhausted()).toBe(false);
    expect(budget.msUntilReset(0)).toBeNull();
  });

  it("should let the latest response overwrite the remaining count", () => {
    const budget = createRateBudget();
    budget.update({ remaining: 100, limit: 5000, resetAtMs: 1_000_000 });
    budget.update({ remaining: 250, limit: null, resetAtMs: null });

    expect(budget.snapshot()).toEqual({ remaining: 250, limit: 5000, resetAtMs: 1_000_000 });
  });

  it("should never go negative", () => {
    const budget = createRateBudget();
    budget.update({ remaining: -3, limit: null, resetAtMs: null });

    expect(budget.snapshot().remaining).toBe(0);
    expect(budget.isExhausted()).toBe(true);
  });

  it("should report the floor as reached when remaining equals it", () => {
    const budget = createRateBudget({ remaining: 50 });
    expect(budget.isBelowFloor(50)).toBe(true);
    expect(budget.isBelowFloor(49)).toBe(false);
  });

  it("should count down to the reset time and stop at zero", () => {
    const budget = createRateBudget({ resetAtMs: 10_000 });
    expect(budget.msUntilReset(4_000)).toBe(6_000);
    expect(budget.msUntilReset(12_000)).toBe(0);
  });
});

describe("header readers", () => {
  it("should read the rate limit headers", () => {
    const headers = new Headers({
      "x-ratelimit-remaining": "4990",
      "x-ratelimit-limit": "5000",
      "x-ratelimit-reset": "1700000000",
    });

    expect(readRateLimitHeaders(headers)).toEqual({
      remaining: 4990,
      limit: 5000,
      resetAtMs: 1_700_000_000_000,
    });
  });

  it("should return nulls when headers are missing or malformed", () => {
    const headers = new Headers({ "x-ratelimit-remaining": "lots" });
    expect(readRateLimitHeaders(headers)).toEqual({
      remaining: null,
      limit: null,
      resetAtMs: null,
    });
  });

  it("should convert retry-after and poll interval to milliseconds", () => {
    const headers = new Headers({ "retry-after": "30", "x-poll-interval": "60" });
    expect(readRetryAfterMs(headers)).toBe(30_000);
    expect(readPollIntervalMs(headers)).toBe(60_000);
  });
});
