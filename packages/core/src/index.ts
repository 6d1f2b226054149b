export { FactoryRegistry, defaultRegistry } from "./di/registry";
export { defineInterface, interfaceOf, methodGuard } from "./di/interfaces";

export { ServiceLocator } from "./locator/service-locator";
export type { ServiceLocatorOptions } from "./locator/service-locator";
export { runInServiceScope, currentServiceScope, ServiceCache, ServiceScope } from "./locator/scope";
export type { CloseErrorHandler } from "./locator/scope";

export { INSTRUMENTATION, TELEMETRY_FACTORIES, registerTelemetryFactories } from "./builtins";

export { withTestServiceLocator } from "./testing/test-locator";
