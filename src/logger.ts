import pino from "pino";

/**
 * Creates the service logger: structured JSON on stdout with string level
 * labels and ISO timestamps.
 *
 * The level comes from the argument, then `LOG_LEVEL`, then `info`.
 * Bot tokens and session strings are redacted wherever they appear under
 * the usual field names. Output goes to stdout unless a destination is given.
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "chat-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    redact: ["botToken", "session", "*.botToken", "*.session"],
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(options, destination) : pino(options);
}
