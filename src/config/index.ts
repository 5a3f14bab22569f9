import { existsSync, readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";
import type { PacingPolicy } from "../watch/pacing";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  // An empty file parses to null; treat it as "all defaults".
  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Loads the config file when it exists. A missing file is an error only when
 * the path was given explicitly; otherwise every setting takes its default.
 */
export function resolveConfig(configPath: string, explicit: boolean): AppConfig {
  if (!explicit && !existsSync(configPath)) {
    return appConfigSchema.parse({});
  }
  return loadConfig(configPath);
}

export function toPacingPolicy(config: AppConfig): PacingPolicy {
  return {
    baseIntervalMs: config.polling.baseIntervalSeconds * 1000,
    lowBudgetFloor: config.polling.lowBudgetFloor,
    lowBudgetMultiplier: config.polling.lowBudgetMultiplier,
    transientBaseMs: config.backoff.transientBaseMs,
    transientMaxRetries: config.backoff.transientMaxRetries,
    rateLimitMinDelayMs: config.backoff.rateLimitMinDelayMs,
    maxDelayMs: config.backoff.maxDelayMs,
  };
}

export type { AppConfig };
