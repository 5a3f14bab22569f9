// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Represents an object with a stop method for graceful shutdown.
 */
export type Stoppable = {
  readonly stop: () => void;
};

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly stoppables: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
  readonly exit?: (code: number) => void;
  readonly onSignal?: (signal: NodeJS.Signals, handler: () => void) => void;
};

/**
 * Registers SIGTERM and SIGINT signal handlers for graceful shutdown.
 *
 * - The first signal asks every stoppable to stop; feeds finish their
 *   in-flight fetch and the caller exits once they have all returned
 * - Wraps each stop in try/catch so one failure does not block the rest
 * - A second signal exits immediately with code 130
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  const onSignal =
    deps.onSignal ??
    ((signal: NodeJS.Signals, handler: () => void) => {
      process.on(signal, handler);
    });
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) {
      deps.logger.warn({ signal }, "second shutdown signal, exiting immediately");
      exit(130);
      return;
    }
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const stoppable of deps.stoppables) {
      try {
        stoppable.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping watcher");
      }
    }
  };

  onSignal("SIGTERM", () => shutdown("SIGTERM"));
  onSignal("SIGINT", () => shutdown("SIGINT"));
}
