import pino from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Log level is emitted as its string label
 * - ISO 8601 timestamps
 * - Level comes from `LOG_LEVEL`, defaulting to `info`
 *
 * @param level - Optional override for the log level
 * @param destination - Stream to write to instead of stdout
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
