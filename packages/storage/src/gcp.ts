import type { Readable } from "node:stream";
import { Storage, type Bucket } from "@google-cloud/storage";
import type { Instrumentation } from "@locus-sdk/types";
import { BucketBlobStorage, type BucketClient } from "./bucket";
import { initGoogleCredentialsEnv } from "./credentials";

export class GcsBucketClient implements BucketClient {
  private readonly bucket: Bucket;

  constructor(
    storage: Storage,
    readonly projectName: string,
    readonly bucketName: string,
  ) {
    this.bucket = storage.bucket(bucketName);
  }

  get description(): string {
    return `projectName='${this.projectName}', bucketName='${this.bucketName}'`;
  }

  async statObject(key: string): Promise<boolean> {
    const [exists] = await this.bucket.file(key).exists();
    return exists;
  }

  async openObject(key: string): Promise<Readable> {
    return this.bucket.file(key).createReadStream();
  }

  async putObject(key: string, data: Buffer): Promise<void> {
    await this.bucket.file(key).save(data, { resumable: false });
  }

  /** The client library pages through the listing before returning. */
  async *listObjects(prefix: string): AsyncIterable<string> {
    const [files] = await this.bucket.getFiles({ prefix: prefix || undefined });
    for (const file of files) {
      yield file.name;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.bucket.file(key).delete({ ignoreNotFound: true });
  }
}

export type GoogleBucketBlobStorageOptions = {
  namespace?: string;
  /** Service account file to look for. Defaults to `google_credentials.json`. */
  credsName?: string;
  instrumentation?: Instrumentation;
  /** Use an existing client instead of creating one. */
  storage?: Storage;
};

export class GoogleBucketBlobStorage extends BucketBlobStorage {
  constructor(projectName: string, bucketName: string, options: GoogleBucketBlobStorageOptions = {}) {
    if (!options.storage) {
      initGoogleCredentialsEnv({ credsName: options.credsName });
    }
    const storage = options.storage ?? new Storage({ projectId: projectName });
    super(new GcsBucketClient(storage, projectName, bucketName), {
      label: "GoogleBucketBlobStorage",
      namespace: options.namespace,
      instrumentation: options.instrumentation,
    });
  }
}
