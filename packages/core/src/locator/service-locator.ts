import createDebug from "debug";
import type {
  FactoryDefinition,
  FactoryMap,
  LocusLogger,
  ServiceInterface,
} from "@locus-sdk/types";
import { InvalidReturnTypeError } from "@locus-sdk/common";
import { loadFactoryMap } from "@locus-sdk/config";
import { getRootLogger } from "@locus-sdk/telemetry";
import { defaultRegistry, type FactoryRegistry } from "../di/registry";
import { currentServiceScope, ServiceCache } from "./scope";

const debug = createDebug("locus:core:locator");

export type ServiceLocatorOptions = {
  /** Where `factory` identifiers are looked up. Defaults to `defaultRegistry`. */
  registry?: FactoryRegistry;
  logger?: LocusLogger;
};

/**
 * Creates services from a factory map and caches them per service scope.
 *
 * Outside {@link runInServiceScope} the locator's own root cache is used, so a
 * service is created at most once per (scope, name) and (scope, interface).
 */
export class ServiceLocator {
  private static current: ServiceLocator | null = null;

  private readonly registry: FactoryRegistry;
  private readonly logger: LocusLogger;
  private readonly rootCache = new ServiceCache((service, error) =>
    this.reportCloseFailure(service, error),
  );

  constructor(
    private readonly factoryMap: FactoryMap,
    options: ServiceLocatorOptions = {},
  ) {
    this.registry = options.registry ?? defaultRegistry;
    this.logger = options.logger ?? getRootLogger().child("service-locator");
  }

  getByType<T>(iface: ServiceInterface<T>): T {
    const cache = this.cache();
    if (cache.byInterface.has(iface.id)) {
      debug("getByType %s → cached", iface.id);
      return this.verify(iface, cache.byInterface.get(iface.id));
    }

    const { name, definition } = this.factoryMap.getByType(iface.id);
    const instance = this.create(cache, name, definition);
    cache.byName.set(name, instance);
    cache.byInterface.set(definition.interfaceId, instance);
    return this.verify(iface, instance);
  }

  /**
   * Looks a service up by its feature name. The interface slot is only filled
   * when empty, so a default already cached for the interface is kept.
   */
  getByName<T>(name: string, iface: ServiceInterface<T>): T {
    const cache = this.cache();
    if (cache.byName.has(name)) {
      debug("getByName %s → cached", name);
      return this.verify(iface, cache.byName.get(name));
    }

    const definition = this.factoryMap.getByName(name);
    const instance = this.create(cache, name, definition);
    cache.byName.set(name, instance);
    if (!cache.byInterface.has(definition.interfaceId)) {
      cache.byInterface.set(definition.interfaceId, instance);
    }
    return this.verify(iface, instance);
  }

  getFactoryMap(): FactoryMap {
    return this.factoryMap;
  }

  /**
   * Closes every service created outside a service scope that exposes a
   * close-like method, newest first, and empties the root cache. Services
   * created inside a scope are closed when that scope ends.
   * A failing close is logged and the remaining services are still closed.
   */
  async close(): Promise<void> {
    debug("close: %d services", this.rootCache.closeableCount);
    await this.rootCache.close();
  }

  private cache(): ServiceCache {
    const scope = currentServiceScope();
    if (!scope) return this.rootCache;
    return scope.cacheFor(
      this,
      () => new ServiceCache((service, error) => this.reportCloseFailure(service, error)),
    );
  }

  private reportCloseFailure(service: string, error: unknown): void {
    this.logger.warn(`Failed to close service ${service}`, {
      service,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  private create(cache: ServiceCache, name: string, definition: FactoryDefinition): unknown {
    this.logger.info(`Instantiating service with factory ${definition.factoryId}`, {
      service: name,
      factory: definition.factoryId,
    });
    const instance = this.registry.create(definition);
    cache.track(name, instance);
    return instance;
  }

  private verify<T>(iface: ServiceInterface<T>, instance: unknown): T {
    if (!iface.isImplementedBy(instance)) {
      throw new InvalidReturnTypeError(iface.id);
    }
    return instance;
  }

  // -------------------------------------------------------------------------
  // Process-wide locator
  // -------------------------------------------------------------------------

  /** Replaces the process-wide locator, discarding the previous one and its caches. */
  static configure(factoryMap: FactoryMap, options: ServiceLocatorOptions = {}): ServiceLocator {
    if (ServiceLocator.current) {
      (options.logger ?? getRootLogger()).warn(
        "ServiceLocator already configured. Reconfiguration occurring.",
      );
    }
    ServiceLocator.current = new ServiceLocator(factoryMap, options);
    return ServiceLocator.current;
  }

  /**
   * The process-wide locator. On first use it is built from the features
   * config found in the working directory or `~/.locus`.
   */
  static instance(): ServiceLocator {
    if (!ServiceLocator.current) {
      getRootLogger().info("Creating ServiceLocator instance");
      ServiceLocator.current = new ServiceLocator(loadFactoryMap());
    }
    return ServiceLocator.current;
  }

  static isConfigured(): boolean {
    return ServiceLocator.current !== null;
  }

  static service<T>(iface: ServiceInterface<T>): T {
    return ServiceLocator.instance().getByType(iface);
  }

  static serviceByName<T>(name: string, iface: ServiceInterface<T>): T {
    return ServiceLocator.instance().getByName(name, iface);
  }

  /** Forgets the process-wide locator without closing its services. */
  static reset(): void {
    ServiceLocator.current = null;
  }

  /** Closes the process-wide locator's services, then resets. */
  static async shutdown(): Promise<void> {
    const locator = ServiceLocator.current;
    ServiceLocator.current = null;
    if (locator) await locator.close();
  }
}
