import type { FactoryDefinition, Primitive, PropertyProvider } from "@locus-sdk/types";
import { FeatureConfigError } from "@locus-sdk/common";
import { STANDARD_PROVIDERS } from "./providers";

export const PROPERTY_SIGIL = "$";
export const PROPERTY_DEFAULT_SEPARATOR = "=";

/**
 * Substitutes `$NAME` and `$NAME=default` tokens in factory arguments with
 * values from an ordered list of providers. The first non-empty value wins.
 * An empty default (`$NAME=`) counts as no default.
 */
export class PropertyResolver {
  constructor(private readonly providers: readonly PropertyProvider[]) {}

  /**
   * Resolves the string arguments and keyword values of a definition.
   * The definition is updated in place and returned.
   *
   * @throws FeatureConfigError when a token has no value and no non-empty default.
   */
  resolve(definition: FactoryDefinition): FactoryDefinition {
    definition.args = definition.args.map((arg) => this.resolvePrimitive(arg));
    definition.kwargs = Object.fromEntries(
      Object.entries(definition.kwargs).map(([key, value]) => [key, this.resolvePrimitive(value)]),
    );
    return definition;
  }

  resolveValue(value: string): string {
    if (!value.startsWith(PROPERTY_SIGIL)) return value;

    const token = value.slice(PROPERTY_SIGIL.length);
    const separator = token.indexOf(PROPERTY_DEFAULT_SEPARATOR);
    const name = separator === -1 ? token : token.slice(0, separator);
    const fallback = separator === -1 ? undefined : token.slice(separator + 1);

    for (const provider of this.providers) {
      const resolved = provider(name);
      if (resolved) return resolved;
    }
    if (fallback) return fallback;

    throw new FeatureConfigError(`No property value found for ${value}`);
  }

  private resolvePrimitive(value: Primitive): Primitive {
    return typeof value === "string" ? this.resolveValue(value) : value;
  }
}

export const STANDARD_PROPERTY_RESOLVER = new PropertyResolver(STANDARD_PROVIDERS);
