import pino from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps for structured log aggregation
 * - Level configurable via `LOG_LEVEL` env var, defaults to `info`
 * - Writes to stderr; stdout is reserved for the event stream
 *
 * @param level - Optional override for log level (defaults to LOG_LEVEL env var or "info")
 * @param destination - Optional stream override, mainly for tests
 */
export function createLogger(
  level?: string,
  destination: pino.DestinationStream = pino.destination(2),
): pino.Logger {
  return pino(
    {
      level: level ?? process.env["LOG_LEVEL"] ?? "info",
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}
