import type { AbstractType, ServiceInterface } from "@locus-sdk/types";

/**
 * Declares a service interface checked by a type guard.
 *
 * @example
 * const CLOCK = defineInterface("app.Clock", methodGuard<Clock>("now"));
 */
export function defineInterface<T>(
  id: string,
  guard: (value: unknown) => value is T,
): ServiceInterface<T> {
  return { id, isImplementedBy: guard };
}

/** Declares a service interface satisfied by instances of an (abstract) class. */
export function interfaceOf<T>(id: string, type: AbstractType<T>): ServiceInterface<T> {
  return defineInterface(id, (value): value is T => value instanceof type);
}

/** Guard accepting any object that has every named method. */
export function methodGuard<T>(...methods: (keyof T & string)[]): (value: unknown) => value is T {
  return (value): value is T =>
    typeof value === "object" &&
    value !== null &&
    methods.every((method) => typeof Reflect.get(value, method) === "function");
}
