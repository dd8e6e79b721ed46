/**
 * Main Logger Setup
 *
 * Creates structured Pino logger instances with secret redaction, pretty-printing
 * in development, and JSON output in production / test environments.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./secret-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Output destination. Defaults to stdout; tests pass an in-memory stream. */
  destination?: pino.DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

/**
 * Build the Pino transport configuration.
 *
 * - In **development** we pipe through `pino-pretty` for human-readable output.
 * - In **production / test** we emit structured JSON (no transport needed).
 */
function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

/**
 * Create a new root Pino logger.
 *
 * @param options - Optional overrides for level, service name and destination.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "wikindex";

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(loggerOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...loggerOptions, ...(transport ? { transport } : {}) });
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * stage-scoped bindings (e.g. `stage`, `collection`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** A logger that drops everything. Handy as a default for library code. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
