import createDebug from "debug";
import type { Instrumentation, LocusLogger } from "@locus-sdk/types";
import { getRootLogger } from "./logger";

const debug = createDebug("locus:telemetry:instrumentation");

export function assertCounterIncrease(increase: number): void {
  if (!Number.isInteger(increase) || increase < 0) {
    throw new RangeError(`Increase must be a positive integer, not ${increase}`);
  }
}

/**
 * Logs execution times, counter increases and gauge updates as they occur.
 * Gauge and counter values are kept in memory for the lifetime of the instance.
 */
export class BasicLogInstrument implements Instrumentation {
  protected readonly gauges = new Map<string, number>();
  protected readonly counters = new Map<string, number>();
  private readonly logger: LocusLogger;

  constructor(logger?: LocusLogger) {
    this.logger = logger ?? getRootLogger().child("instrumentation");
  }

  registerReport(reportId: string): void {
    debug("registerReport %s", reportId);
  }

  registerGauge(gaugeId: string): void {
    debug("registerGauge %s", gaugeId);
  }

  registerCounter(counterId: string): void {
    debug("registerCounter %s", counterId);
  }

  report(reportId: string, startTime: Date, endTime: Date): void {
    if (startTime > endTime) {
      this.logger.warn("Instrumentation: start time is after end time", { reportId });
    }
    const seconds = (endTime.getTime() - startTime.getTime()) / 1000;
    this.logger.info(`Instrumentation: [${reportId}] took ${seconds}s`, { reportId, seconds });
  }

  updateGauge(gaugeId: string, delta: number): void {
    const value = (this.gauges.get(gaugeId) ?? 0) + delta;
    this.gauges.set(gaugeId, value);
    this.logger.info(`Instrumentation: ${gaugeId} updated to ${value}`, { gaugeId, value });
  }

  increaseCounter(counterId: string, increase: number): void {
    assertCounterIncrease(increase);
    const value = (this.counters.get(counterId) ?? 0) + increase;
    this.counters.set(counterId, value);
    this.logger.info(`Instrumentation: ${counterId} increased to ${value}`, { counterId, value });
  }

  gaugeValue(gaugeId: string): number | undefined {
    return this.gauges.get(gaugeId);
  }

  counterValue(counterId: string): number | undefined {
    return this.counters.get(counterId);
  }
}
