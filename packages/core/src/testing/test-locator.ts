import type { FactoryDefinition, FactoryMap } from "@locus-sdk/types";
import { DictionaryFactoryMap } from "@locus-sdk/config";
import { ServiceLocator, type ServiceLocatorOptions } from "../locator/service-locator";

/**
 * Configures the process-wide locator for the duration of `fn`, then closes
 * its services and resets it, even when `fn` throws.
 *
 * @example
 * await withTestServiceLocator({ clock: fakeClockDefinition }, () => {
 *   expect(ServiceLocator.service(CLOCK).now()).toBe(0);
 * }, { registry });
 */
export async function withTestServiceLocator<T>(
  factoryMap: FactoryMap | Record<string, FactoryDefinition>,
  fn: (locator: ServiceLocator) => T | Promise<T>,
  options: ServiceLocatorOptions = {},
): Promise<T> {
  const map = isFactoryMap(factoryMap) ? factoryMap : new DictionaryFactoryMap(factoryMap);
  const locator = ServiceLocator.configure(map, options);
  try {
    return await fn(locator);
  } finally {
    await ServiceLocator.shutdown();
  }
}

function isFactoryMap(value: FactoryMap | Record<string, FactoryDefinition>): value is FactoryMap {
  return (
    typeof value.getByType === "function" &&
    typeof value.getByName === "function" &&
    typeof value.names === "function"
  );
}
