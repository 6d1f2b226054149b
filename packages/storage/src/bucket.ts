import { Writable, type Readable } from "node:stream";
import { finished } from "node:stream/promises";
import createDebug from "debug";
import type {
  Blob,
  BlobData,
  BlobKey,
  DeletableBlobStorage,
  Instrumentation,
} from "@locus-sdk/types";
import {
  BlobNotFoundError,
  BlobStorageError,
  joinKey,
  sanitiseKey,
  stripKeyPrefix,
  toBlobKey,
} from "@locus-sdk/common";
import { NOOP_INSTRUMENT, timed, timedIterable } from "@locus-sdk/telemetry";
import { toBuffer } from "./transcoding";

const debug = createDebug("locus:storage:bucket");

/** The flat object store operations a bucket backend has to provide. */
export interface BucketClient {
  /** Describes the bucket for storage ids, e.g. `bucketName='assets'`. */
  readonly description: string;
  /** False when the backend reports the object as not found. */
  statObject(key: string): Promise<boolean>;
  openObject(key: string): Promise<Readable>;
  putObject(key: string, data: Buffer): Promise<void>;
  /** Every object key starting with `prefix`. */
  listObjects(prefix: string): AsyncIterable<string>;
  deleteObject(key: string): Promise<void>;
}

export type BucketBlobStorageOptions = {
  /** Name used in storage ids and metric names. */
  label?: string;
  namespace?: string;
  instrumentation?: Instrumentation;
};

class BucketBlob implements Blob {
  constructor(
    readonly key: BlobKey,
    private readonly objectKey: string,
    private readonly client: BucketClient,
  ) {}

  async withStream<T>(fn: (stream: Readable) => T | Promise<T>): Promise<T> {
    let stream: Readable;
    try {
      stream = await this.client.openObject(this.objectKey);
    } catch (error) {
      throw new BlobStorageError(`Error streaming data for key '${this.key}'`, {
        key: this.key,
        cause: error,
      });
    }
    try {
      return await fn(stream);
    } finally {
      stream.destroy();
    }
  }

  toString(): string {
    return `BucketBlob {key=${this.key}}`;
  }
}

/**
 * Blob storage over a flat bucket. Namespaces are key prefixes: they are
 * joined onto every key sent to the client and stripped from keys returned.
 *
 * Uploads are buffered in memory and sent in a single call.
 */
export class BucketBlobStorage implements DeletableBlobStorage {
  protected readonly label: string;
  protected readonly prefix: string;
  protected readonly instrumentation: Instrumentation;

  constructor(
    protected readonly client: BucketClient,
    options: BucketBlobStorageOptions = {},
  ) {
    this.label = options.label ?? "BucketBlobStorage";
    this.prefix = sanitiseKey(options.namespace ?? "");
    this.instrumentation = options.instrumentation ?? NOOP_INSTRUMENT;
  }

  get storageId(): string {
    return `${this.label}[${this.client.description}, namespace='${this.prefix}']`;
  }

  put(key: BlobKey, data: BlobData): Promise<void> {
    return timed(this.instrumentation, this.metric("put"), async () => {
      const objectKey = this.objectKey(key);
      try {
        await this.client.putObject(objectKey, await toBuffer(data));
      } catch (error) {
        throw new BlobStorageError(`Error uploading data for key '${key}'`, { key, cause: error });
      }
    });
  }

  async withPutter<T>(key: BlobKey, fn: (stream: Writable) => T | Promise<T>): Promise<T> {
    const chunks: Buffer[] = [];
    const buffer = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    let result: T;
    try {
      result = await fn(buffer);
    } catch (error) {
      buffer.destroy();
      throw error;
    }

    if (!buffer.writableEnded) buffer.end();
    await finished(buffer);
    await this.put(key, Buffer.concat(chunks));
    return result;
  }

  get(key: BlobKey): Promise<Blob> {
    return timed(this.instrumentation, this.metric("get"), async () => {
      const objectKey = this.objectKey(key);
      let exists: boolean;
      try {
        exists = await this.client.statObject(objectKey);
      } catch (error) {
        throw new BlobStorageError(`Error getting data for key '${key}'`, { key, cause: error });
      }
      if (!exists) throw new BlobNotFoundError(key);
      return new BucketBlob(this.blobKey(objectKey), objectKey, this.client);
    });
  }

  delete(key: BlobKey): Promise<void> {
    return timed(this.instrumentation, this.metric("delete"), async () => {
      try {
        await this.client.deleteObject(this.objectKey(key));
      } catch (error) {
        throw new BlobStorageError(`Error deleting blob with key '${key}'`, { key, cause: error });
      }
    });
  }

  async namespace(prefix: string): Promise<BucketBlobStorage> {
    const namespace = joinKey(this.prefix, prefix);
    debug("namespace %s → %s", this.storageId, namespace);
    return new BucketBlobStorage(this.client, {
      label: this.label,
      namespace,
      instrumentation: this.instrumentation,
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Blob> {
    return timedIterable(this.instrumentation, this.metric("iterate"), () => this.list());
  }

  private async *list(): AsyncGenerator<Blob, void, undefined> {
    const marker = this.prefix ? `${this.prefix}/` : "";
    try {
      for await (const objectKey of this.client.listObjects(marker)) {
        if (this.prefix && objectKey === marker) continue;
        yield new BucketBlob(this.blobKey(objectKey), objectKey, this.client);
      }
    } catch (error) {
      if (error instanceof BlobStorageError) throw error;
      throw new BlobStorageError(`Error listing contents of ${this.storageId}`, { cause: error });
    }
  }

  protected metric(operation: string): string {
    return `locus.storage.${this.label}.${operation}`;
  }

  private objectKey(key: BlobKey): string {
    return joinKey(this.prefix, key);
  }

  private blobKey(objectKey: string): BlobKey {
    return toBlobKey(stripKeyPrefix(objectKey, this.prefix));
  }
}
