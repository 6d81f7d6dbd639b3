import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, scrubSecrets } from "./secret-redactor.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "debug" in development, "info" elsewhere. */
  level?: string;
  /** Bound as `name` on every line. */
  service?: string;
  /** Write JSON lines here instead of stdout; disables the pretty transport. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function prettyTransport(): pino.TransportSingleOptions {
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

/**
 * `err` serializer. Driver and SDK errors echo connection strings and
 * bearer tokens in their message and stack, so both are scrubbed. AppError
 * fields (`kind`, `code`, `details`) come through as enumerable props.
 */
export function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) {
    return typeof err === "string" ? scrubSecrets(err) : err;
  }
  const serialized = pino.stdSerializers.err(err);
  return {
    ...serialized,
    message: scrubSecrets(serialized.message),
    stack: scrubSecrets(serialized.stack),
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const development = isDevelopment();
  const loggerOptions: pino.LoggerOptions = {
    level: options.level ?? (development ? "debug" : "info"),
    name: options.service ?? "sitedocs",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    serializers: { err: serializeError },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }
  return pino(development ? { ...loggerOptions, transport: prettyTransport() } : loggerOptions);
}

/** Per-document child logger (`documentId`, `stage`, `jobId`). */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
