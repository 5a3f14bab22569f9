import { parseArgs } from "node:util";
import { parseResource, resourceKey } from "./watch/cursor";
import type { WatchedResource } from "./watch/types";

export const USAGE = `usage: feedwatch [options] owner/repo [owner/repo ...]

Watches GitHub repository event feeds and prints new events as they arrive.

options:
  -c, --config <path>     YAML config file (default: $CONFIG_PATH or ./config.yaml)
  -t, --token-env <name>  environment variable holding the API token (default: GITHUB_TOKEN)
  -i, --interval <secs>   base polling interval, overrides the config file
  -q, --quiet             do not print "no new events" heartbeats
  -h, --help              show this message`;

export type CliOptions = {
  readonly configPath: string | null;
  readonly tokenEnv: string;
  readonly intervalSeconds: number | null;
  readonly quiet: boolean;
  readonly help: boolean;
  readonly resources: ReadonlyArray<string>;
};

export type ParseCliResult =
  | { readonly success: true; readonly options: CliOptions }
  | { readonly success: false; readonly error: string };

function parseArgv(argv: ReadonlyArray<string>) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      config: { type: "string", short: "c" },
      "token-env": { type: "string", short: "t" },
      interval: { type: "string", short: "i" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

export function parseCliArgs(argv: ReadonlyArray<string>): ParseCliResult {
  let parsed: ReturnType<typeof parseArgv>;
  try {
    parsed = parseArgv(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }

  const { values, positionals } = parsed;

  let intervalSeconds: number | null = null;
  if (values.interval !== undefined) {
    intervalSeconds = Number(values.interval);
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      return {
        success: false,
        error: `--interval must be a positive number of seconds, got "${values.interval}"`,
      };
    }
  }

  return {
    success: true,
    options: {
      configPath: values.config ?? null,
      tokenEnv: values["token-env"] ?? "GITHUB_TOKEN",
      intervalSeconds,
      quiet: values.quiet ?? false,
      help: values.help ?? false,
      resources: positionals,
    },
  };
}

export type ResolveResourcesResult =
  | { readonly success: true; readonly resources: ReadonlyArray<WatchedResource> }
  | { readonly success: false; readonly errors: ReadonlyArray<string> };

/**
 * Parses every `owner/repo` name, config entries first, dropping repeats
 * (names compare case-insensitively). Any malformed name fails the whole
 * set so nothing starts on a partial list.
 */
export function resolveResources(names: ReadonlyArray<string>): ResolveResourcesResult {
  const resources = new Map<string, WatchedResource>();
  const errors: string[] = [];

  for (const name of names) {
    const result = parseResource(name);
    if (!result.success) {
      errors.push(result.error);
      continue;
    }

    const key = resourceKey(result.resource);
    if (!resources.has(key)) {
      resources.set(key, result.resource);
    }
  }

  if (errors.length > 0) {
    return { success: false, errors };
  }

  return { success: true, resources: [...resources.values()] };
}
