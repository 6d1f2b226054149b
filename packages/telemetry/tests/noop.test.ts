import { describe, it, expect } from "vitest";
import { NoopInstrument, NOOP_INSTRUMENT } from "../src/noop";

describe("NoopInstrument", () => {
  it("should have no-op methods that do not throw", () => {
    const instrument = new NoopInstrument();

    expect(() => instrument.registerReport()).not.toThrow();
    expect(() => instrument.registerGauge()).not.toThrow();
    expect(() => instrument.registerCounter()).not.toThrow();
    expect(() => instrument.report()).not.toThrow();
    expect(() => instrument.updateGauge()).not.toThrow();
    expect(() => instrument.increaseCounter()).not.toThrow();
  });

  it("should expose a shared instance", () => {
    expect(NOOP_INSTRUMENT).toBeInstanceOf(NoopInstrument);
  });
});
