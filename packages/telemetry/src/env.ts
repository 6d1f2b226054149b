import type { LogLevel } from "@locus-sdk/types";

export type LogFormat = "json" | "human";

export type TelemetryConfig = {
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  logFilePath: string | null;
  redactKeys: string[];
};

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(["debug", "info", "warn", "error"]);
const VALID_LOG_FORMATS: ReadonlySet<string> = new Set<LogFormat>(["json", "human"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.has(value);
}

function isLogFormat(value: string | undefined): value is LogFormat {
  return value !== undefined && VALID_LOG_FORMATS.has(value);
}

export function readTelemetryEnv(): TelemetryConfig {
  const rawLevel = process.env.LOCUS_LOG_LEVEL?.toLowerCase();
  const rawFormat = process.env.LOCUS_LOG_FORMAT?.toLowerCase();

  return {
    serviceName: process.env.LOCUS_SERVICE_NAME ?? "locus",
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "json",
    logFilePath: process.env.LOCUS_LOG_FILE_PATH || null,
    redactKeys: resolveRedactKeys(process.env.LOCUS_LOG_REDACT_KEYS),
  };
}

function resolveRedactKeys(keys: string | undefined): string[] {
  if (!keys) return [];
  return keys
    .split(",")
    .map((k) => k.trim())
    .filter(Boolean);
}
