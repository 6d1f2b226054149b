export { readTelemetryEnv } from "./env";
export type { TelemetryConfig, LogFormat } from "./env";

export { LocusLoggerImpl, createLogger, getRootLogger, setRootLogger } from "./logger";

export { BasicLogInstrument, assertCounterIncrease } from "./instrumentation";
export { OTelInstrument } from "./otel-instrument";
export { NoopInstrument, NOOP_INSTRUMENT } from "./noop";
export { timed, timedIterable, counted, instrumentTimer, instrumentCounter } from "./helpers";
