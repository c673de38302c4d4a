import pino, { type Level, type Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  readonly level?: Level | "silent";
  /** Extra fields bound to every line. */
  readonly base?: Record<string, unknown>;
};

/**
 * Structured logger for diagnostics.
 *
 * Writes to stderr: stdout is reserved for the JSON envelopes commands print.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  return pino(
    {
      name: "asana-pulse",
      level: opts.level ?? "warn",
      base: { ...opts.base },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination(2),
  );
}

/** Logger that drops everything. Default for SDK callers that pass none. */
export const silentLogger: Logger = pino({ level: "silent" });
