import {
  metrics,
  type Counter,
  type Histogram,
  type Meter,
  type UpDownCounter,
} from "@opentelemetry/api";
import type { Instrumentation } from "@locus-sdk/types";
import { assertCounterIncrease } from "./instrumentation";

/**
 * Instrumentation backed by the OpenTelemetry metrics API.
 *
 * Timings become a histogram in seconds, gauges an up-down counter and
 * counters a monotonic counter. Without a registered MeterProvider every
 * call is a no-op.
 */
export class OTelInstrument implements Instrumentation {
  private readonly meter: Meter;
  private readonly histograms = new Map<string, Histogram>();
  private readonly gauges = new Map<string, UpDownCounter>();
  private readonly counters = new Map<string, Counter>();

  constructor(meterName = "locus") {
    this.meter = metrics.getMeter(meterName);
  }

  registerReport(reportId: string): void {
    this.histogram(reportId);
  }

  registerGauge(gaugeId: string): void {
    this.gauge(gaugeId);
  }

  registerCounter(counterId: string): void {
    this.counter(counterId);
  }

  report(reportId: string, startTime: Date, endTime: Date): void {
    const seconds = Math.max(0, (endTime.getTime() - startTime.getTime()) / 1000);
    this.histogram(reportId).record(seconds);
  }

  updateGauge(gaugeId: string, delta: number): void {
    this.gauge(gaugeId).add(delta);
  }

  increaseCounter(counterId: string, increase: number): void {
    assertCounterIncrease(increase);
    this.counter(counterId).add(increase);
  }

  private histogram(id: string): Histogram {
    let histogram = this.histograms.get(id);
    if (!histogram) {
      histogram = this.meter.createHistogram(id, { unit: "s" });
      this.histograms.set(id, histogram);
    }
    return histogram;
  }

  private gauge(id: string): UpDownCounter {
    let gauge = this.gauges.get(id);
    if (!gauge) {
      gauge = this.meter.createUpDownCounter(id);
      this.gauges.set(id, gauge);
    }
    return gauge;
  }

  private counter(id: string): Counter {
    let counter = this.counters.get(id);
    if (!counter) {
      counter = this.meter.createCounter(id);
      this.counters.set(id, counter);
    }
    return counter;
  }
}
