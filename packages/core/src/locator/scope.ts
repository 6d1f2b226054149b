import { AsyncLocalStorage } from "node:async_hooks";

const CLOSE_METHODS = ["close", "end", "quit", "disconnect", "destroy"] as const;

type CloseEntry = {
  name: string;
  close: () => Promise<void> | void;
};

function detectCloseMethod(value: unknown): (() => Promise<void> | void) | null {
  if (typeof value !== "object" || value === null) return null;

  for (const method of CLOSE_METHODS) {
    const fn: unknown = Reflect.get(value, method);
    if (typeof fn === "function") {
      return () => Reflect.apply(fn, value, []);
    }
  }

  return null;
}

/** Called with the feature name and the error when closing a service fails. */
export type CloseErrorHandler = (service: string, error: unknown) => void;

/** Instances created by one locator inside one scope, and how to close them. */
export class ServiceCache {
  readonly byName = new Map<string, unknown>();
  readonly byInterface = new Map<string, unknown>();
  private closeStack: CloseEntry[] = [];
  private tracked = new Set<unknown>();

  constructor(private readonly onCloseError: CloseErrorHandler) {}

  /** Remembers `instance` for {@link close} when it exposes a close-like method. */
  track(name: string, instance: unknown): void {
    if (this.tracked.has(instance)) return;
    const close = detectCloseMethod(instance);
    if (close) {
      this.closeStack.push({ name, close });
      this.tracked.add(instance);
    }
  }

  get closeableCount(): number {
    return this.closeStack.length;
  }

  /**
   * Closes tracked services newest first and empties the cache.
   * A failing close is reported and the remaining services are still closed.
   */
  async close(): Promise<void> {
    const entries = this.closeStack.reverse();
    this.closeStack = [];
    this.tracked.clear();
    this.byName.clear();
    this.byInterface.clear();
    for (const entry of entries) {
      try {
        await entry.close();
      } catch (error) {
        this.onCloseError(entry.name, error);
      }
    }
  }
}

/**
 * An isolated set of service caches. Each locator gets its own cache within
 * a scope, so reconfiguring never reuses instances from the previous locator.
 */
export class ServiceScope {
  private caches = new WeakMap<object, ServiceCache>();
  private created: ServiceCache[] = [];

  cacheFor(owner: object, create: () => ServiceCache): ServiceCache {
    let cache = this.caches.get(owner);
    if (!cache) {
      cache = create();
      this.caches.set(owner, cache);
      this.created.push(cache);
    }
    return cache;
  }

  /** Closes the services of every locator used in this scope, latest cache first. */
  async close(): Promise<void> {
    const caches = this.created.reverse();
    this.created = [];
    for (const cache of caches) {
      await cache.close();
    }
  }
}

const scopeStorage = new AsyncLocalStorage<ServiceScope>();

/**
 * Runs `fn` in a fresh service scope. Services looked up inside it, including
 * from async continuations, are created at most once per scope and are not
 * shared with code outside it. Once `fn` settles, the scope's services are closed.
 */
export async function runInServiceScope<T>(fn: () => T | Promise<T>): Promise<T> {
  const scope = new ServiceScope();
  try {
    return await scopeStorage.run(scope, fn);
  } finally {
    await scope.close();
  }
}

export function currentServiceScope(): ServiceScope | undefined {
  return scopeStorage.getStore();
}
