export { LocusConfig, DEFAULT_FEATURES_CONFIG, USER_CONFIG_DIR } from "./env";

export {
  commandLineProvider,
  environmentProvider,
  dotEnvProvider,
  STANDARD_PROVIDERS,
} from "./providers";
export {
  PropertyResolver,
  STANDARD_PROPERTY_RESOLVER,
  PROPERTY_SIGIL,
  PROPERTY_DEFAULT_SEPARATOR,
} from "./property-resolver";

export { DictionaryFactoryMap } from "./factory-map";

export { featureDefinitionSchema, featuresConfigSchema } from "./schema";
export type { FeatureDefinitionJson, FeaturesConfigJson } from "./schema";

export { FileLocator, currentOrHome } from "./file-locator";
export {
  CONFIG_VERSION,
  factoryDefinitionFromJson,
  factoryMapFromJson,
  factoryMapFromFile,
  loadFactoryMap,
} from "./loader";
export type { LoadFactoryMapOptions } from "./loader";
