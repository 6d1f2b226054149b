import { Readable } from "node:stream";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import type { Instrumentation } from "@locus-sdk/types";
import { BucketBlobStorage, type BucketClient } from "./bucket";
import { initAwsCredentialsEnv } from "./credentials";

/** Leaves requests unsigned, for public buckets. */
const UNSIGNED: S3ClientConfig["signer"] = {
  sign: async (request) => request,
};

/** Static identity so the SDK never searches for credentials on anonymous clients. */
const NO_CREDENTIALS: S3ClientConfig["credentials"] = { accessKeyId: "", secretAccessKey: "" };

export function isS3NotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.$metadata.httpStatusCode === 404 || error.name === "NotFound" || error.name === "NoSuchKey")
  );
}

export class S3BucketClient implements BucketClient {
  constructor(
    private readonly s3: S3Client,
    readonly bucketName: string,
  ) {}

  get description(): string {
    return `bucketName='${this.bucketName}'`;
  }

  async statObject(key: string): Promise<boolean> {
    try {
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucketName, Key: key }));
      return true;
    } catch (error) {
      if (isS3NotFound(error)) return false;
      throw error;
    }
  }

  async openObject(key: string): Promise<Readable> {
    const { Body: body } = await this.s3.send(
      new GetObjectCommand({ Bucket: this.bucketName, Key: key }),
    );
    if (!body) return Readable.from([], { objectMode: false });
    if (body instanceof Readable) return body;
    return Readable.from([Buffer.from(await body.transformToByteArray())], { objectMode: false });
  }

  async putObject(key: string, data: Buffer): Promise<void> {
    await this.s3.send(new PutObjectCommand({ Bucket: this.bucketName, Key: key, Body: data }));
  }

  async *listObjects(prefix: string): AsyncIterable<string> {
    const pages = paginateListObjectsV2(
      { client: this.s3 },
      { Bucket: this.bucketName, Prefix: prefix || undefined },
    );
    for await (const page of pages) {
      for (const object of page.Contents ?? []) {
        if (object.Key) yield object.Key;
      }
    }
  }

  /** S3 treats deleting a missing key as success. */
  async deleteObject(key: string): Promise<void> {
    await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucketName, Key: key }));
  }
}

export type AwsBucketBlobStorageOptions = {
  namespace?: string;
  /** Send unsigned requests and skip credentials discovery. */
  anonymous?: boolean;
  /** Shared credentials file to look for. Defaults to `credentials`. */
  credsName?: string;
  region?: string;
  /** Custom endpoint, e.g. an S3-compatible store. Enables path-style addressing. */
  endpoint?: string;
  instrumentation?: Instrumentation;
  /** Use an existing client instead of creating one. */
  client?: S3Client;
};

export type S3ClientOptions = Pick<AwsBucketBlobStorageOptions, "anonymous" | "region" | "endpoint">;

/** Builds the client an AwsBucketBlobStorage uses when none is given. */
export function createS3Client(options: S3ClientOptions = {}): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint,
    forcePathStyle: options.endpoint ? true : undefined,
    ...(options.anonymous ? { signer: UNSIGNED, credentials: NO_CREDENTIALS } : {}),
  });
}

export class AwsBucketBlobStorage extends BucketBlobStorage {
  constructor(bucketName: string, options: AwsBucketBlobStorageOptions = {}) {
    if (!options.anonymous && !options.client) {
      initAwsCredentialsEnv({ credsName: options.credsName });
    }
    super(new S3BucketClient(options.client ?? createS3Client(options), bucketName), {
      label: "AwsBucketBlobStorage",
      namespace: options.namespace,
      instrumentation: options.instrumentation,
    });
  }
}
