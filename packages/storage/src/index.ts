export { FileBlobStorage, DEFAULT_BUFFER_SIZE } from "./file";
export type { FileBlobStorageOptions } from "./file";

export { BucketBlobStorage } from "./bucket";
export type { BucketClient, BucketBlobStorageOptions } from "./bucket";
export { MemoryBlobStorage, MemoryBucketClient } from "./memory";
export type { MemoryBlobStorageOptions } from "./memory";
export { AwsBucketBlobStorage, S3BucketClient, createS3Client, isS3NotFound } from "./aws";
export type { AwsBucketBlobStorageOptions, S3ClientOptions } from "./aws";
export { GoogleBucketBlobStorage, GcsBucketClient } from "./gcp";
export type { GoogleBucketBlobStorageOptions } from "./gcp";

export {
  initAwsCredentialsEnv,
  initGoogleCredentialsEnv,
  AWS_CREDENTIALS_ENV,
  AWS_DEFAULT_CREDENTIALS_FILE,
  GOOGLE_CREDENTIALS_ENV,
  GOOGLE_DEFAULT_CREDENTIALS_FILE,
} from "./credentials";
export type { CredentialsLookupOptions } from "./credentials";

export { readBytes, readText, writeText } from "./transcoding";

export { BLOB_STORAGE, DELETABLE_BLOB_STORAGE } from "./interfaces";
export { STORAGE_FACTORIES, registerStorageFactories } from "./register";
