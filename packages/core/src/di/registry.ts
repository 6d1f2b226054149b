import createDebug from "debug";
import type {
  ClassProvider,
  FactoryDefinition,
  FactoryOptions,
  FactoryProvider,
  Primitive,
  Provider,
  Type,
} from "@locus-sdk/types";
import { FactoryLoadError } from "@locus-sdk/common";

const debug = createDebug("locus:core:registry");

function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

/**
 * Maps the `factory` identifiers of a features config to constructors and
 * factory functions. Implementation modules register themselves on import.
 */
export class FactoryRegistry {
  private providers = new Map<string, Provider>();

  register(id: string, provider: Provider): this {
    debug("register %s (%s)", id, isClassProvider(provider) ? "class" : "factory");
    this.providers.set(id, provider);
    return this;
  }

  registerClass(id: string, target: Type): this {
    return this.register(id, { useClass: target });
  }

  registerFactory(id: string, factory: FactoryProvider["useFactory"]): this {
    return this.register(id, { useFactory: factory });
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  ids(): string[] {
    return [...this.providers.keys()];
  }

  /** @throws FactoryLoadError when nothing is registered under `id`. */
  load(id: string): Provider {
    const provider = this.providers.get(id);
    if (!provider) throw new FactoryLoadError(id);
    return provider;
  }

  /**
   * Calls a provider with the positional arguments, followed by the keyword
   * arguments as a single options object when there are any.
   * Errors thrown by the constructor or factory propagate unchanged.
   */
  instantiate(provider: Provider, args: readonly Primitive[], kwargs: FactoryOptions): unknown {
    const params: unknown[] = Object.keys(kwargs).length > 0 ? [...args, kwargs] : [...args];
    if (isClassProvider(provider)) {
      return new provider.useClass(...params);
    }
    return provider.useFactory(...params);
  }

  create(definition: FactoryDefinition): unknown {
    return this.instantiate(this.load(definition.factoryId), definition.args, definition.kwargs);
  }
}

/** Registry consulted by locators that are not given one explicitly. */
export const defaultRegistry = new FactoryRegistry();
