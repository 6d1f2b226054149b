import { readFileSync } from "node:fs";
import createDebug from "debug";
import type { z } from "zod";
import type { FactoryDefinition, FactoryMap } from "@locus-sdk/types";
import { FeatureConfigError, FeatureError } from "@locus-sdk/common";
import { getRootLogger } from "@locus-sdk/telemetry";
import { DictionaryFactoryMap } from "./factory-map";
import { FileLocator, currentOrHome } from "./file-locator";
import { LocusConfig } from "./env";
import { PropertyResolver, STANDARD_PROPERTY_RESOLVER } from "./property-resolver";
import { describeIssues, featureDefinitionSchema, featuresConfigSchema } from "./schema";

const debug = createDebug("locus:config:loader");

/** Features config schema version this release reads. */
export const CONFIG_VERSION = 1;

export type LoadFactoryMapOptions = {
  /** Defaults to `FEATURES_CONFIG`, then `features.json`. */
  fileName?: string;
  /** Directories to search, in order. Defaults to the working directory, then `~/.locus`. */
  paths?: readonly string[];
  resolver?: PropertyResolver;
};

/** Converts one `features` entry into a resolved definition. */
export function factoryDefinitionFromJson(
  json: unknown,
  resolver: PropertyResolver = STANDARD_PROPERTY_RESOLVER,
): FactoryDefinition {
  const parsed = featureDefinitionSchema.safeParse(json);
  if (!parsed.success) {
    throw new FeatureConfigError(`Invalid feature definition: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return toDefinition(parsed.data, resolver);
}

/**
 * Builds a factory map from a parsed features config.
 * The version is checked before the rest of the document is validated.
 */
export function factoryMapFromJson(
  json: unknown,
  resolver: PropertyResolver = STANDARD_PROPERTY_RESOLVER,
): FactoryMap {
  const version = readVersion(json);
  if (version !== CONFIG_VERSION) {
    throw new FeatureConfigError(
      `Incorrect feature version in config ${String(version)}, but required ${CONFIG_VERSION}`,
    );
  }

  const parsed = featuresConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new FeatureConfigError(`Invalid features config: ${describeIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const definitions = new Map<string, FactoryDefinition>();
  for (const [name, feature] of Object.entries(parsed.data.features)) {
    definitions.set(name, toDefinition(feature, resolver));
  }
  debug("loaded %d feature definitions", definitions.size);
  return new DictionaryFactoryMap(definitions);
}

/**
 * Reads a features config file and builds its factory map.
 * Read, parse and config errors are reported against the file path.
 */
export function factoryMapFromFile(
  filePath: string,
  resolver: PropertyResolver = STANDARD_PROPERTY_RESOLVER,
): FactoryMap {
  getRootLogger().child("config").info(`Reading factory map file from ${filePath}`);
  try {
    const json: unknown = JSON.parse(readFileSync(filePath, "utf8"));
    return factoryMapFromJson(json, resolver);
  } catch (error) {
    if (error instanceof FeatureError && !(error instanceof FeatureConfigError)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new FeatureConfigError(`Problem with file '${filePath}': ${message}`, { cause: error });
  }
}

/** Discovers the features config file and loads it. */
export function loadFactoryMap(options: LoadFactoryMapOptions = {}): FactoryMap {
  const fileName = options.fileName ?? LocusConfig.getFeaturesConfigName();
  const filePath = new FileLocator(options.paths ?? currentOrHome()).findFile(fileName);
  return factoryMapFromFile(filePath, options.resolver);
}

function readVersion(json: unknown): unknown {
  if (typeof json === "object" && json !== null && "version" in json) {
    return json.version;
  }
  return 0;
}

function toDefinition(
  feature: z.output<typeof featureDefinitionSchema>,
  resolver: PropertyResolver,
): FactoryDefinition {
  return resolver.resolve({
    factoryId: feature.factory,
    interfaceId: feature.implements,
    args: feature.args,
    kwargs: feature.kwargs,
    isDefault: feature.default,
  });
}
