import { defaultRegistry, type FactoryRegistry } from "@locus-sdk/core";
import { AwsBucketBlobStorage } from "./aws";
import { FileBlobStorage } from "./file";
import { GoogleBucketBlobStorage } from "./gcp";
import { MemoryBlobStorage } from "./memory";

export const STORAGE_FACTORIES = {
  file: "locus.storage.FileBlobStorage",
  memory: "locus.storage.MemoryBlobStorage",
  aws: "locus.storage.AwsBucketBlobStorage",
  gcp: "locus.storage.GoogleBucketBlobStorage",
} as const;

export function registerStorageFactories(registry: FactoryRegistry = defaultRegistry): void {
  registry
    .registerClass(STORAGE_FACTORIES.file, FileBlobStorage)
    .registerClass(STORAGE_FACTORIES.memory, MemoryBlobStorage)
    .registerClass(STORAGE_FACTORIES.aws, AwsBucketBlobStorage)
    .registerClass(STORAGE_FACTORIES.gcp, GoogleBucketBlobStorage);
}

registerStorageFactories();
