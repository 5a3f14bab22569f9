import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { createWatchSupervisor } from "./supervisor";
import { createMemoryCursorStore } from "./cursor-store";
import type { CursorStore } from "./cursor-store";
import { createRateBudget } from "./rate-budget";
import type { FetchOutcome, PageFetcher } from "./types";
import { formatResource } from "./types";
import {
  FATAL,
  TEST_POLICY,
  createRecordingSink,
  createScriptedFetcher,
  failure,
  makeResource,
  newData,
  unchanged,
} from "../test-utils/fakes";
import type { ScriptedFetcher } from "../test-utils/fakes";

const logger = pino({ level: "silent" });
const FAST_POLICY = { ...TEST_POLICY, baseIntervalMs: 5, transientBaseMs: 1, rateLimitMinDelayMs: 1 };

const alpha = makeResource("octo-org/alpha");
const bravo = makeResource("octo-org/bravo");
const charlie = makeResource("octo-org/charlie");

function routeFetcher(routes: Record<string, ScriptedFetcher>): PageFetcher {
  return {
    fetch: (resource, cursor, mode) => {
      const fetcher = routes[formatResource(resource)];
      if (!fetcher) throw new Error(`unexpected feed ${formatResource(resource)}`);
      return fetcher.fetch(resource, cursor, mode);
    },
  };
}

function makeSupervisor(
  fetcher: PageFetcher,
  overrides: { cursorStore?: CursorStore; seedConcurrency?: number; policy?: typeof TEST_POLICY } = {},
) {
  return createWatchSupervisor({
    fetcher,
    budget: createRateBudget(),
    policy: overrides.policy ?? FAST_POLICY,
    cursorStore: overrides.cursorStore ?? createMemoryCursorStore(),
    seedConcurrency: overrides.seedConcurrency ?? 4,
    logger,
  });
}

describe("createWatchSupervisor", () => {
  it("should seed a new feed silently and then deliver later events", async () => {
    const store = createMemoryCursorStore();
    const sink = createRecordingSink();
    const supervisor = makeSupervisor(
      routeFetcher({ "octo-org/alpha": createScriptedFetcher([newData([1, 2, 3]), newData([4])]) }),
      { cursorStore: store },
    );

    const done = supervisor.run([alpha], sink);
    await vi.waitFor(() => expect(sink.deliveredIds()).toEqual(["4"]));
    supervisor.stop();

    await expect(done).resolves.toEqual({
      status: "stopped",
      exits: [{ resource: alpha, kind: "cancelled" }],
    });
    expect(sink.deliveredIds()).toEqual(["4"]);
    expect(store.load(alpha)).toEqual({ etag: null, newestId: "4" });
  });

  it("should resume from a stored cursor without seeding", async () => {
    const store = createMemoryCursorStore();
    store.save(alpha, { etag: '"e1"', newestId: "3" });
    const fetcher = createScriptedFetcher([newData([2, 3, 4])]);
    const sink = createRecordingSink();
    const supervisor = makeSupervisor(routeFetcher({ "octo-org/alpha": fetcher }), {
      cursorStore: store,
    });

    const done = supervisor.run([alpha], sink);
    await vi.waitFor(() => expect(sink.deliveredIds()).toEqual(["4"]));
    supervisor.stop();
    await done;

    expect(fetcher.calls[0]?.cursor).toEqual({ etag: '"e1"', newestId: "3" });
    expect(store.load(alpha)).toEqual({ etag: null, newestId: "4" });
  });

  it("should keep other feeds running when one fails", async () => {
    const sink = createRecordingSink();
    const supervisor = makeSupervisor(
      routeFetcher({
        "octo-org/alpha": createScriptedFetcher([newData([1]), newData([2])]),
        "octo-org/bravo": createScriptedFetcher([failure(FATAL)]),
        "octo-org/charlie": createScriptedFetcher([newData([10]), newData([11])]),
      }),
    );

    const done = supervisor.run([alpha, bravo, charlie], sink);
    await vi.waitFor(() => {
      expect([...sink.deliveredIds()].sort()).toEqual(["11", "2"]);
      expect(supervisor.activeFeeds()).toBe(2);
    });
    supervisor.stop();

    await expect(done).resolves.toEqual({
      status: "stopped",
      exits: [
        { resource: alpha, kind: "cancelled" },
        { resource: bravo, kind: "fatal", error: FATAL },
        { resource: charlie, kind: "cancelled" },
      ],
    });
    expect(supervisor.activeFeeds()).toBe(0);
  });

  it("should report failure when every feed fails", async () => {
    const supervisor = makeSupervisor(
      routeFetcher({
        "octo-org/alpha": createScriptedFetcher([failure(FATAL)]),
        "octo-org/bravo": createScriptedFetcher([unchanged(), failure(FATAL)]),
      }),
    );

    const result = await supervisor.run([alpha, bravo], createRecordingSink());

    expect(result.status).toBe("failed");
    expect(result.exits.map((exit) => exit.kind)).toEqual(["fatal", "fatal"]);
  });

  it("should watch a repository named twice only once", async () => {
    const fetcher = createScriptedFetcher([failure(FATAL)]);
    const supervisor = makeSupervisor(routeFetcher({ "octo-org/alpha": fetcher }));

    const result = await supervisor.run(
      [alpha, { owner: "Octo-Org", name: "Alpha" }],
      createRecordingSink(),
    );

    expect(result.exits).toHaveLength(1);
    expect(fetcher.calls).toHaveLength(1);
  });

  it("should limit how many feeds seed at once", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const fetcher: PageFetcher = {
      fetch: async (): Promise<FetchOutcome> => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return newData([1]);
      },
    };
    const spy = vi.fn(fetcher.fetch);
    const supervisor = makeSupervisor(
      { fetch: spy },
      { seedConcurrency: 1, policy: TEST_POLICY },
    );

    const done = supervisor.run([alpha, bravo, charlie], createRecordingSink());
    await vi.waitFor(() => expect(spy).toHaveBeenCalledTimes(3));
    await vi.waitFor(() => expect(inFlight).toBe(0));
    supervisor.stop();
    await done;

    expect(maxInFlight).toBe(1);
  });

  it("should turn a cursor store failure into a fatal exit", async () => {
    const supervisor = makeSupervisor(createScriptedFetcher([]), {
      cursorStore: {
        load: () => {
          throw new Error("database is locked");
        },
        save: () => undefined,
      },
    });

    const result = await supervisor.run([alpha], createRecordingSink());

    expect(result).toEqual({
      status: "failed",
      exits: [
        {
          resource: alpha,
          kind: "fatal",
          error: { kind: "fatal", message: "database is locked", status: null },
        },
      ],
    });
  });

  it("should watch again after a stopped run", async () => {
    const fetcher = createScriptedFetcher([newData([1])]);
    const supervisor = makeSupervisor(routeFetcher({ "octo-org/alpha": fetcher }));

    const first = supervisor.run([alpha], createRecordingSink());
    await vi.waitFor(() => expect(fetcher.calls.length).toBeGreaterThanOrEqual(2));
    supervisor.stop();
    await first;
    const callsBefore = fetcher.calls.length;

    const second = supervisor.run([alpha], createRecordingSink());
    await vi.waitFor(() => expect(fetcher.calls.length).toBeGreaterThanOrEqual(callsBefore + 2));
    supervisor.stop();

    await expect(second).resolves.toEqual({
      status: "stopped",
      exits: [{ resource: alpha, kind: "cancelled" }],
    });
    // The stored cursor carries over, so the second run resumes instead of seeding.
    expect(fetcher.calls[callsBefore]?.mode).toBe("poll");
  });

  it("should refuse to run twice at the same time", async () => {
    const supervisor = makeSupervisor(createScriptedFetcher([]), { policy: TEST_POLICY });

    const done = supervisor.run([alpha], createRecordingSink());

    await expect(supervisor.run([bravo], createRecordingSink())).rejects.toThrow(
      "supervisor is already running",
    );
    supervisor.stop();
    await expect(done).resolves.toEqual({
      status: "stopped",
      exits: [{ resource: alpha, kind: "cancelled" }],
    });
  });
});
