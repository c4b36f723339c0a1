import pino, { type DestinationStream, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  service?: string;
  level?: LevelWithSilent;
  /** Defaults to stderr; stdout carries command output. */
  destination?: DestinationStream;
}

const SEVERITY: Record<string, string> = {
  trace: "DEBUG",
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
  fatal: "CRITICAL",
};

/**
 * Credential fields that can show up in structured log context.
 */
const REDACT_PATHS = [
  "token",
  "password",
  "*.token",
  "*.password",
  '*["client-key-data"]',
  '*["client-certificate-data"]',
];

/**
 * Create the process logger.
 *
 * JSON lines with Cloud Logging severity labels and ISO timestamps,
 * written to stderr unless a destination is given.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { service = "kubeconfig", level = "info" } = options;

  return pino(
    {
      level,
      formatters: {
        level(label) {
          return { severity: SEVERITY[label] ?? label.toUpperCase() };
        },
      },
      base: { service },
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger that drops everything, for library callers that do not care.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
