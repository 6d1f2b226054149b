import type { Instrumentation } from "@locus-sdk/types";

export class NoopInstrument implements Instrumentation {
  registerReport(): void {}
  registerGauge(): void {}
  registerCounter(): void {}
  report(): void {}
  updateGauge(): void {}
  increaseCounter(): void {}
}

export const NOOP_INSTRUMENT: Instrumentation = new NoopInstrument();
