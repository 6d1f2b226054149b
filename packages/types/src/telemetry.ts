export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured logger used across the Locus packages. */
export interface LocusLogger {
  debug(message: string, attributes?: Record<string, unknown>): void;
  info(message: string, attributes?: Record<string, unknown>): void;
  warn(message: string, attributes?: Record<string, unknown>): void;
  error(message: string, attributes?: Record<string, unknown>): void;

  /** Create a named child logger. Adds the name to all log records. */
  child(name: string, attributes?: Record<string, unknown>): LocusLogger;

  /** Create a logger enriched with additional context attributes. */
  withContext(attributes: Record<string, unknown>): LocusLogger;
}

/** Reports execution timings, counters and gauges. */
export interface Instrumentation {
  registerReport(reportId: string): void;
  registerGauge(gaugeId: string): void;
  registerCounter(counterId: string): void;
  report(reportId: string, startTime: Date, endTime: Date): void;
  updateGauge(gaugeId: string, delta: number): void;
  /** @throws RangeError when `increase` is negative. */
  increaseCounter(counterId: string, increase: number): void;
}
