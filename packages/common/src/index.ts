export {
  LocusError,
  FeatureError,
  FeatureNotFoundError,
  MultipleFeatureDefaultsError,
  InvalidReturnTypeError,
  FeatureConfigError,
  ConfigFileNotFoundError,
  FactoryLoadError,
  BlobStorageError,
  BlobNotFoundError,
  hasErrorCode,
} from "./errors";
export type { BlobStorageErrorOptions } from "./errors";

export { sanitiseKey, joinKey, toBlobKey, stripKeyPrefix } from "./keys";
