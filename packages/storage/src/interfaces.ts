import type { BlobStorage, DeletableBlobStorage } from "@locus-sdk/types";
import { defineInterface, methodGuard } from "@locus-sdk/core";

const hasStorageMethods = methodGuard<BlobStorage>("put", "withPutter", "get", "namespace");

function isBlobStorage(value: unknown): value is BlobStorage {
  return hasStorageMethods(value) && typeof Reflect.get(value, Symbol.asyncIterator) === "function";
}

function isDeletableBlobStorage(value: unknown): value is DeletableBlobStorage {
  return isBlobStorage(value) && typeof Reflect.get(value, "delete") === "function";
}

export const BLOB_STORAGE = defineInterface("locus.storage.BlobStorage", isBlobStorage);

export const DELETABLE_BLOB_STORAGE = defineInterface(
  "locus.storage.DeletableBlobStorage",
  isDeletableBlobStorage,
);
