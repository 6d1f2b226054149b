/** Values a factory definition may pass to a constructor. */
export type Primitive = string | number | boolean | string[] | number[] | boolean[];

/**
 * Declarative record describing which registered factory to call, for which
 * interface, and with which arguments.
 *
 * Property tokens (`$NAME` / `$NAME=default`) in `args` and `kwargs` are
 * substituted in place once, when the definition is loaded.
 */
export type FactoryDefinition = {
  factoryId: string;
  interfaceId: string;
  args: Primitive[];
  kwargs: Record<string, Primitive>;
  isDefault: boolean;
};

export type FactoryLookup = {
  name: string;
  definition: FactoryDefinition;
};

/** Provides factory definitions by interface identifier and by name. */
export interface FactoryMap {
  getByType(interfaceId: string): FactoryLookup;
  getByName(name: string): FactoryDefinition;
  names(): string[];
}

/** Looks a property up by name; `undefined` when the source has no value for it. */
export type PropertyProvider = (name: string) => string | undefined;

/** Runtime identifier of a capability that several implementations may satisfy. */
export interface ServiceInterface<T> {
  readonly id: string;
  isImplementedBy(value: unknown): value is T;
}
