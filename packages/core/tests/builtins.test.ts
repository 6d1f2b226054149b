import { describe, it, expect } from "vitest";
import { BasicLogInstrument, NOOP_INSTRUMENT, OTelInstrument } from "@locus-sdk/telemetry";
import { FactoryRegistry, defaultRegistry } from "../src/di/registry";
import { INSTRUMENTATION, TELEMETRY_FACTORIES, registerTelemetryFactories } from "../src/builtins";

describe("INSTRUMENTATION", () => {
  it("should accept the telemetry implementations", () => {
    expect(INSTRUMENTATION.id).toBe("locus.telemetry.Instrumentation");
    expect(INSTRUMENTATION.isImplementedBy(NOOP_INSTRUMENT)).toBe(true);
    expect(INSTRUMENTATION.isImplementedBy(new OTelInstrument("locus-test"))).toBe(true);
  });

  it("should reject objects missing part of the contract", () => {
    expect(INSTRUMENTATION.isImplementedBy({ report: () => undefined })).toBe(false);
  });
});

describe("registerTelemetryFactories", () => {
  it("should register into the default registry on import", () => {
    expect(defaultRegistry.has(TELEMETRY_FACTORIES.basicLog)).toBe(true);
    expect(defaultRegistry.has(TELEMETRY_FACTORIES.otel)).toBe(true);
    expect(defaultRegistry.has(TELEMETRY_FACTORIES.noop)).toBe(true);
  });

  it("should register into a given registry", () => {
    const registry = new FactoryRegistry();

    registerTelemetryFactories(registry);

    expect(registry.load("locus.telemetry.BasicLogInstrument")).toEqual({
      useClass: BasicLogInstrument,
    });
    expect(registry.ids()).toHaveLength(3);
  });
});
