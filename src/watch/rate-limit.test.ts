import { describe, it, expect } from "vitest";
import { classifyErrorResponse, classifyRateLimit } from "./rate-limit";
import type { ErrorResponseDetails } from "./rate-limit";

function makeDetails(overrides: Partial<ErrorResponseDetails> = {}): ErrorResponseDetails {
  return {
    status: 403,
    message: null,
    rateLimit: { remaining: null, limit: null, resetAtMs: null },
    retryAfterMs: null,
    ...overrides,
  };
}

describe("classifyRateLimit", () => {
  it("classifies secondary when the message mentions secondary or abuse limits", () => {
    expect(
      classifyRateLimit(makeDetails({ message: "You have exceeded a secondary rate limit" })),
    ).toBe("secondary");
    expect(classifyRateLimit(makeDetails({ status: 429, message: "Abuse detected" }))).toBe(
      "secondary",
    );
  });

  it("classifies primary when remaining is 0", () => {
    const details = makeDetails({
      message: "API rate limit exceeded",
      rateLimit: { remaining: 0, limit: 60, resetAtMs: 1_700_000_000_000 },
    });
    expect(classifyRateLimit(details)).toBe("primary");
  });

  it("classifies a bare 429 as unknown", () => {
    expect(classifyRateLimit(makeDetails({ status: 429 }))).toBe("unknown");
  });

  it("does not treat a plain 403 with budget left as a rate limit", () => {
    const details = makeDetails({
      message: "Resource not accessible by integration",
      rateLimit: { remaining: 4000, limit: 5000, resetAtMs: null },
    });
    expect(classifyRateLimit(details)).toBeNull();
  });

  it("returns null for other statuses", () => {
    expect(classifyRateLimit(makeDetails({ status: 500 }))).toBeNull();
  });
});

describe("classifyErrorResponse", () => {
  it("maps rate limits to rate-limited with the retry hints", () => {
    const error = classifyErrorResponse(
      makeDetails({
        message: "API rate limit exceeded",
        rateLimit: { remaining: 0, limit: 60, resetAtMs: 1_700_000_000_000 },
        retryAfterMs: 30_000,
      }),
    );

    expect(error).toEqual({
      kind: "rate-limited",
      message: "HTTP 403: API rate limit exceeded (primary rate limit)",
      retryAfterMs: 30_000,
      resetAtMs: 1_700_000_000_000,
    });
  });

  it("maps server errors and 408 to transient", () => {
    expect(classifyErrorResponse(makeDetails({ status: 502 }))).toEqual({
      kind: "transient",
      message: "HTTP 502",
      status: 502,
    });
    expect(classifyErrorResponse(makeDetails({ status: 408 })).kind).toBe("transient");
  });

  it.each([401, 403, 404, 410, 422])("maps %i to fatal", (status) => {
    const error = classifyErrorResponse(makeDetails({ status, message: "nope" }));
    expect(error).toEqual({ kind: "fatal", message: `HTTP ${status}: nope`, status });
  });
});
