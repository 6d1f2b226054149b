import type { Instrumentation } from "@locus-sdk/types";
import { BasicLogInstrument, NoopInstrument, OTelInstrument } from "@locus-sdk/telemetry";
import { defineInterface, methodGuard } from "./di/interfaces";
import { defaultRegistry, type FactoryRegistry } from "./di/registry";

export const INSTRUMENTATION = defineInterface(
  "locus.telemetry.Instrumentation",
  methodGuard<Instrumentation>(
    "registerReport",
    "registerGauge",
    "registerCounter",
    "report",
    "updateGauge",
    "increaseCounter",
  ),
);

export const TELEMETRY_FACTORIES = {
  basicLog: "locus.telemetry.BasicLogInstrument",
  otel: "locus.telemetry.OTelInstrument",
  noop: "locus.telemetry.NoopInstrument",
} as const;

export function registerTelemetryFactories(registry: FactoryRegistry = defaultRegistry): void {
  registry
    .registerClass(TELEMETRY_FACTORIES.basicLog, BasicLogInstrument)
    .registerClass(TELEMETRY_FACTORIES.otel, OTelInstrument)
    .registerClass(TELEMETRY_FACTORIES.noop, NoopInstrument);
}

registerTelemetryFactories();
