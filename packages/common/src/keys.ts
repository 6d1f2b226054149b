import type { BlobKey } from "@locus-sdk/types";
import { BlobStorageError } from "./errors";

/**
 * Strips leading and trailing slashes so a key can be appended to a prefix.
 *
 * @example
 * sanitiseKey("/a/b.txt") => "a/b.txt"
 * sanitiseKey("folder/") => "folder"
 */
export function sanitiseKey(key: string): string {
  return key.replace(/^\/+/, "").replace(/\/+$/, "");
}

/**
 * Joins a namespace prefix with a key, both sanitised.
 *
 * @example
 * joinKey("datasets", "/a.csv") => "datasets/a.csv"
 * joinKey("", "a.csv") => "a.csv"
 * joinKey("datasets", "/") => "datasets"
 */
export function joinKey(prefix: string, key: string): string {
  const base = sanitiseKey(prefix);
  const tail = sanitiseKey(key);
  if (!base) return tail;
  if (!tail) return base;
  return `${base}/${tail}`;
}

/** Absolute-style key as returned to callers: leading `/`, forward slashes. */
export function toBlobKey(relativeKey: string): BlobKey {
  return `/${sanitiseKey(relativeKey)}`;
}

/**
 * Removes a namespace prefix from a backend key.
 * Fails when the backend returned a key outside the namespace.
 */
export function stripKeyPrefix(fullKey: string, prefix: string): string {
  if (!prefix) return fullKey;
  if (!fullKey.startsWith(`${prefix}/`)) {
    throw new BlobStorageError(
      `Blob namespace '${prefix}' does not match blob name '${fullKey}'`,
      { key: fullKey },
    );
  }
  return fullKey.slice(prefix.length + 1);
}
