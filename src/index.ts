import { resolve } from "node:path";
import { createLogger } from "./logger";
import { resolveConfig, toPacingPolicy } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { USAGE, parseCliArgs, resolveResources } from "./cli";
import { registerShutdownHandlers } from "./lifecycle";
import { createConsoleSink } from "./sink/console";
import {
  createGitHubFetcher,
  createMemoryCursorStore,
  createRateBudget,
  createSqliteCursorStore,
  createWatchSupervisor,
} from "./watch";
import type { CursorStore } from "./watch";

const DEFAULT_CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<number> {
  const logger = createLogger();

  const cli = parseCliArgs(process.argv.slice(2));
  if (!cli.success) {
    logger.fatal({ error: cli.error }, "invalid arguments");
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const options = cli.options;
  if (options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let config: AppConfig;
  const configPath = resolve(options.configPath ?? DEFAULT_CONFIG_PATH);
  try {
    config = resolveConfig(configPath, options.configPath !== null);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    return 1;
  }

  const resolved = resolveResources([...config.resources, ...options.resources]);
  if (!resolved.success) {
    logger.fatal({ errors: resolved.errors }, "repositories must be in owner/repo format");
    return 1;
  }
  if (resolved.resources.length === 0) {
    logger.fatal("no repositories to watch");
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const token = process.env[options.tokenEnv] ?? null;
  if (!token) {
    logger.warn(
      { tokenEnv: options.tokenEnv },
      "no API token set, using the unauthenticated rate limit",
    );
  }

  let cursorStore: CursorStore = createMemoryCursorStore();
  let closeDb: (() => void) | null = null;
  if (config.state.databasePath) {
    const database = createDatabase(resolve(config.state.databasePath));
    cursorStore = createSqliteCursorStore(database.db);
    closeDb = database.close;
    logger.info({ path: config.state.databasePath }, "cursor store opened");
  }

  const policy = toPacingPolicy(config);
  const budget = createRateBudget();
  const fetcher = createGitHubFetcher(
    {
      apiUrl: config.github.apiUrl,
      userAgent: config.github.userAgent,
      perPage: config.github.perPage,
      maxPages: config.polling.maxPages,
      requestTimeoutMs: config.polling.requestTimeoutMs,
      token,
    },
    budget,
    logger,
  );

  const supervisor = createWatchSupervisor({
    fetcher,
    budget,
    policy:
      options.intervalSeconds === null
        ? policy
        : { ...policy, baseIntervalMs: options.intervalSeconds * 1000 },
    cursorStore,
    seedConcurrency: config.seed.concurrency,
    logger,
  });

  registerShutdownHandlers({ stoppables: [supervisor], logger });

  const result = await supervisor.run(
    resolved.resources,
    createConsoleSink({ quiet: options.quiet }),
  );

  if (closeDb) {
    try {
      closeDb();
      logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "error closing database");
    }
  }

  if (result.status === "failed") {
    logger.error("every feed failed, exiting");
    return 1;
  }

  logger.info("shutdown complete");
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal startup error:", err);
    process.exit(1);
  });
