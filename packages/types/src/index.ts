export type {
  Type,
  AbstractType,
  FactoryOptions,
  ClassProvider,
  FactoryProvider,
  Provider,
} from "./common";

export type {
  Primitive,
  FactoryDefinition,
  FactoryLookup,
  FactoryMap,
  PropertyProvider,
  ServiceInterface,
} from "./factory";

export type { BlobKey, BlobData, Blob, BlobStorage, DeletableBlobStorage } from "./storage";

export type { LogLevel, LocusLogger, Instrumentation } from "./telemetry";
