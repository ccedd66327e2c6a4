import pino from "pino";

export type LoggerOptions = {
  readonly level?: string;
  // File descriptor or stream to write to; stderr by default so that
  // command output on stdout stays machine-readable.
  readonly destination?: pino.DestinationStream | number;
};

/**
 * Creates the podfetch logger: one JSON object per line, string level
 * labels, ISO 8601 timestamps and `name: "podfetch"` on every entry. The
 * level is taken from `options.level`, then the `LOG_LEVEL` env var, then
 * "info".
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const destination = options.destination ?? 2;
  return pino(
    {
      name: "podfetch",
      level: options.level ?? process.env["LOG_LEVEL"] ?? "info",
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    typeof destination === "number" ? pino.destination(destination) : destination,
  );
}
