import type { FactoryDefinition, FactoryLookup, FactoryMap } from "@locus-sdk/types";
import { FeatureNotFoundError, MultipleFeatureDefaultsError } from "@locus-sdk/common";

/**
 * FactoryMap over an in-memory collection of named definitions.
 *
 * The interface index is built once, in definition order: a default always
 * holds its interface slot, otherwise the last definition seen does.
 */
export class DictionaryFactoryMap implements FactoryMap {
  private readonly definitions: ReadonlyMap<string, FactoryDefinition>;
  private readonly byInterface = new Map<string, FactoryLookup>();

  constructor(definitions: Record<string, FactoryDefinition> | Map<string, FactoryDefinition>) {
    this.definitions =
      definitions instanceof Map ? new Map(definitions) : new Map(Object.entries(definitions));

    for (const [name, definition] of this.definitions) {
      const current = this.byInterface.get(definition.interfaceId);
      if (!current || !current.definition.isDefault) {
        this.byInterface.set(definition.interfaceId, { name, definition });
      } else if (definition.isDefault) {
        throw new MultipleFeatureDefaultsError(definition.interfaceId);
      }
    }
  }

  getByType(interfaceId: string): FactoryLookup {
    const lookup = this.byInterface.get(interfaceId);
    if (!lookup) throw new FeatureNotFoundError(interfaceId);
    return lookup;
  }

  getByName(name: string): FactoryDefinition {
    const definition = this.definitions.get(name);
    if (!definition) throw new FeatureNotFoundError(name);
    return definition;
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}
