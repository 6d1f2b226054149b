import type { Readable, Writable } from "node:stream";

/** Path-like blob key, e.g. `/datasets/a/b.json`. */
export type BlobKey = string;

export type BlobData = string | Uint8Array | Readable;

/**
 * A handle to a stored byte sequence.
 *
 * The stream is only open for the duration of the callback and is released
 * on every exit path.
 *
 * @example
 * const blob = await storage.get("config.json");
 * const text = await blob.withStream((stream) => readText(stream));
 */
export interface Blob {
  readonly key: BlobKey;
  withStream<T>(fn: (stream: Readable) => T | Promise<T>): Promise<T>;
}

/**
 * A simple blob store. Keys look like paths and are always returned relative
 * to the store (or namespace) root with a leading `/`.
 */
export interface BlobStorage extends AsyncIterable<Blob> {
  /** Human-readable description of the backend and its configuration. */
  readonly storageId: string;

  put(key: BlobKey, data: BlobData): Promise<void>;

  /**
   * Opens a writable byte stream for `key`. The blob is finalised when the
   * callback settles; the stream is closed even if the callback throws.
   */
  withPutter<T>(key: BlobKey, fn: (stream: Writable) => T | Promise<T>): Promise<T>;

  get(key: BlobKey): Promise<Blob>;

  /**
   * A view of this store rooted at `prefix`. Namespaces compose and never
   * copy data; parent keys are not reachable from the namespaced store.
   */
  namespace(prefix: string): Promise<BlobStorage>;
}

export interface DeletableBlobStorage extends BlobStorage {
  /** Missing keys and directory-shaped keys are ignored. */
  delete(key: BlobKey): Promise<void>;
  namespace(prefix: string): Promise<DeletableBlobStorage>;
}
