import pino from "pino";
import type { LocusLogger, LogLevel } from "@locus-sdk/types";
import { readTelemetryEnv, type TelemetryConfig } from "./env";

/**
 * Thin pino wrapper implementing LocusLogger.
 * Child loggers extend the dotted `name` field: `locus` → `locus.storage`.
 */
export class LocusLoggerImpl implements LocusLogger {
  constructor(
    private pinoLogger: pino.Logger,
    readonly name?: string,
  ) {}

  debug(message: string, attributes?: Record<string, unknown>): void {
    this.log("debug", message, attributes);
  }

  info(message: string, attributes?: Record<string, unknown>): void {
    this.log("info", message, attributes);
  }

  warn(message: string, attributes?: Record<string, unknown>): void {
    this.log("warn", message, attributes);
  }

  error(message: string, attributes?: Record<string, unknown>): void {
    this.log("error", message, attributes);
  }

  private log(level: LogLevel, message: string, attributes?: Record<string, unknown>): void {
    const fn = this.pinoLogger[level].bind(this.pinoLogger);
    if (attributes) fn(attributes, message);
    else fn(message);
  }

  child(name: string, attributes?: Record<string, unknown>): LocusLogger {
    const qualified = this.name ? `${this.name}.${name}` : name;
    return new LocusLoggerImpl(this.pinoLogger.child({ ...attributes, name: qualified }), qualified);
  }

  withContext(attributes: Record<string, unknown>): LocusLogger {
    return new LocusLoggerImpl(this.pinoLogger.child(attributes), this.name);
  }

  setLevel(level: LogLevel): void {
    this.pinoLogger.level = level;
  }
}

export function createLogger(config: TelemetryConfig): LocusLoggerImpl {
  const streams: pino.StreamEntry[] = [];

  if (config.logFormat === "human") {
    // pino-pretty via worker thread — fine for local dev only
    streams.push({
      level: config.logLevel,
      stream: pino.transport({ target: "pino-pretty", options: { destination: 1 } }),
    });
  } else {
    // Raw JSON to stdout, synchronous
    streams.push({ level: config.logLevel, stream: pino.destination(1) });
  }

  if (config.logFilePath) {
    streams.push({
      level: config.logLevel,
      stream: pino.destination(config.logFilePath),
    });
  }

  const logger = pino(
    {
      name: config.serviceName,
      level: config.logLevel,
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );

  return new LocusLoggerImpl(logger, config.serviceName);
}

let rootLogger: LocusLogger | null = null;

/**
 * Process-wide logger, created from the LOCUS_LOG_* environment on first use.
 * Library code takes a child of this logger unless one is injected.
 */
export function getRootLogger(): LocusLogger {
  if (!rootLogger) {
    rootLogger = createLogger(readTelemetryEnv());
  }
  return rootLogger;
}

/** Replace the process-wide logger. Pass `null` to recreate it from the environment on next use. */
export function setRootLogger(logger: LocusLogger | null): void {
  rootLogger = logger;
}
