import { describe, it, expect } from "vitest";
import {
  EMPTY_CURSOR,
  advanceCursor,
  compareEventIds,
  isSeen,
  parseResource,
  resourceKey,
} from "./cursor";

describe("compareEventIds", () => {
  it("should order ids numerically rather than lexically", () => {
    expect(compareEventIds("9", "10")).toBe(-1);
    expect(compareEventIds("10", "9")).toBe(1);
    expect(compareEventIds("42", "42")).toBe(0);
  });

  it("should compare ids beyond the safe integer range", () => {
    expect(compareEventIds("9007199254740993", "9007199254740992")).toBe(1);
  });

  it("should sort null before any id", () => {
    expect(compareEventIds(null, "1")).toBe(-1);
    expect(compareEventIds("1", null)).toBe(1);
    expect(compareEventIds(null, null)).toBe(0);
  });
});

describe("isSeen", () => {
  it("should treat nothing as seen for the empty cursor", () => {
    expect(isSeen(EMPTY_CURSOR, "1")).toBe(false);
  });

  it("should treat the boundary id and older ids as seen", () => {
    const cursor = { etag: null, newestId: "100" };
    expect(isSeen(cursor, "100")).toBe(true);
    expect(isSeen(cursor, "99")).toBe(true);
    expect(isSeen(cursor, "101")).toBe(false);
  });
});

describe("advanceCursor", () => {
  it("should adopt a newer candidate wholesale", () => {
    const next = advanceCursor(
      { etag: "\"a\"", newestId: "5" },
      { etag: "\"b\"", newestId: "8" },
    );
    expect(next).toEqual({ etag: "\"b\"", newestId: "8" });
  });

  it("should never move the boundary backwards", () => {
    const next = advanceCursor(
      { etag: "\"a\"", newestId: "8" },
      { etag: "\"b\"", newestId: "5" },
    );
    expect(next).toEqual({ etag: "\"b\"", newestId: "8" });
  });

  it("should keep the boundary monotonic across a sequence of polls", () => {
    const candidates = ["3", "7", "5", "7", "12", null, "11"];
    let cursor = EMPTY_CURSOR;
    const boundaries: Array<string | null> = [];

    for (const newestId of candidates) {
      cursor = advanceCursor(cursor, { etag: null, newestId });
      boundaries.push(cursor.newestId);
    }

    expect(boundaries).toEqual(["3", "7", "7", "7", "12", "12", "12"]);
  });
});

describe("parseResource", () => {
  it("should split owner and repository name", () => {
    expect(parseResource("octo-org/hello.world")).toEqual({
      success: true,
      resource: { owner: "octo-org", name: "hello.world" },
    });
  });

  it("should trim surrounding whitespace", () => {
    expect(parseResource("  octo-org/repo ")).toEqual({
      success: true,
      resource: { owner: "octo-org", name: "repo" },
    });
  });

  it.each(["octo-org", "octo-org/", "/repo", "a/b/c", ""])("should reject %j", (raw) => {
    expect(parseResource(raw)).toEqual({
      success: false,
      error: `"${raw}" is not in owner/repo format`,
    });
  });
});

describe("resourceKey", () => {
  it("should be case-insensitive", () => {
    expect(resourceKey({ owner: "Octo-Org", name: "Repo" })).toBe("octo-org/repo");
  });
});
