import type { Primitive } from "./factory";

// Constructor type for the factory registry — uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// Arguments come from config at runtime, so their types cannot be known statically.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

/** Keyword arguments from a factory definition, handed over as one trailing options object. */
export type FactoryOptions = Record<string, Primitive>;

// Provider registration for the factory registry
export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
};

export type FactoryProvider<T = unknown> = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T>;
