// pattern: Imperative Shell
import type { FeedSink } from "../watch/types";
import { formatEvent, formatNotice } from "./format";

export type ConsoleSinkOptions = {
  /** Suppress the "no new events" heartbeat lines */
  readonly quiet?: boolean;
  readonly write?: (line: string) => void;
};

/**
 * Sink that prints one line per delivered event, followed by heartbeat
 * notices carrying the remaining request budget.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): FeedSink {
  const write =
    options.write ??
    ((line: string) => {
      process.stdout.write(`${line}\n`);
    });

  return {
    deliver: (_resource, items) => {
      for (const item of items) {
        write(formatEvent(item));
      }
    },
    notice: (notice) => {
      if (options.quiet && notice.kind === "no-new-events") return;
      write(formatNotice(notice));
    },
  };
}
