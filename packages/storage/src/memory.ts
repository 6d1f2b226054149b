import { Readable } from "node:stream";
import type { Instrumentation } from "@locus-sdk/types";
import { BlobNotFoundError } from "@locus-sdk/common";
import { BucketBlobStorage, type BucketClient } from "./bucket";

/** An in-process bucket. Objects live for as long as the client does. */
export class MemoryBucketClient implements BucketClient {
  private readonly objects = new Map<string, Buffer>();

  constructor(readonly bucketName = "memory") {}

  get description(): string {
    return `bucketName='${this.bucketName}'`;
  }

  async statObject(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async openObject(key: string): Promise<Readable> {
    const data = this.objects.get(key);
    if (!data) throw new BlobNotFoundError(key);
    return Readable.from([data], { objectMode: false });
  }

  async putObject(key: string, data: Buffer): Promise<void> {
    this.objects.set(key, Buffer.from(data));
  }

  /** Keys in lexicographic order, as bucket listings return them. */
  async *listObjects(prefix: string): AsyncIterable<string> {
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
    yield* keys;
  }

  async deleteObject(key: string): Promise<void> {
    this.objects.delete(key);
  }
}

export type MemoryBlobStorageOptions = {
  bucketName?: string;
  namespace?: string;
  instrumentation?: Instrumentation;
  /** Share objects with another store by passing its client. */
  client?: MemoryBucketClient;
};

export class MemoryBlobStorage extends BucketBlobStorage {
  constructor(options: MemoryBlobStorageOptions = {}) {
    super(options.client ?? new MemoryBucketClient(options.bucketName), {
      label: "MemoryBlobStorage",
      namespace: options.namespace,
      instrumentation: options.instrumentation,
    });
  }
}
