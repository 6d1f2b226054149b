import type { LocusLogger } from "@locus-sdk/types";
import { FileLocator, currentOrHome } from "@locus-sdk/config";
import { getRootLogger } from "@locus-sdk/telemetry";

export const AWS_CREDENTIALS_ENV = "AWS_SHARED_CREDENTIALS_FILE";
export const AWS_DEFAULT_CREDENTIALS_FILE = "credentials";
export const GOOGLE_CREDENTIALS_ENV = "GOOGLE_APPLICATION_CREDENTIALS";
export const GOOGLE_DEFAULT_CREDENTIALS_FILE = "google_credentials.json";

export type CredentialsLookupOptions = {
  /** Credentials file name; each cloud has its own default. */
  credsName?: string;
  /** Directories to search. Defaults to the working directory, then `~/.locus`. */
  paths?: readonly string[];
  logger?: LocusLogger;
};

/**
 * Points the AWS SDK at a discovered shared credentials file, unless keys are
 * already in the environment or a file has been chosen. Without a file the
 * SDK falls back to its own chain, such as instance metadata.
 *
 * @returns the credentials file exported, if any
 */
export function initAwsCredentialsEnv(options: CredentialsLookupOptions = {}): string | undefined {
  const logger = options.logger ?? getRootLogger().child("storage");
  if (process.env.AWS_ACCESS_KEY_ID && process.env.AWS_SECRET_ACCESS_KEY) {
    logger.info("Reading credentials from environment variables");
    return undefined;
  }
  return exportCredentialsFile(
    AWS_CREDENTIALS_ENV,
    options.credsName ?? AWS_DEFAULT_CREDENTIALS_FILE,
    options,
    logger,
  );
}

/**
 * Points Google client libraries at a discovered service account file unless
 * `GOOGLE_APPLICATION_CREDENTIALS` is already set. Without a file the
 * libraries use application default credentials.
 */
export function initGoogleCredentialsEnv(
  options: CredentialsLookupOptions = {},
): string | undefined {
  const logger = options.logger ?? getRootLogger().child("storage");
  return exportCredentialsFile(
    GOOGLE_CREDENTIALS_ENV,
    options.credsName ?? GOOGLE_DEFAULT_CREDENTIALS_FILE,
    options,
    logger,
  );
}

function exportCredentialsFile(
  variable: string,
  fileName: string,
  options: CredentialsLookupOptions,
  logger: LocusLogger,
): string | undefined {
  const current = process.env[variable];
  if (current) {
    logger.info(`Reading credentials file from: ${current}`);
    return undefined;
  }

  const found = new FileLocator(options.paths ?? currentOrHome()).findOptional(fileName);
  if (!found) {
    logger.info("No credentials file found, using ambient credentials", { fileName });
    return undefined;
  }

  process.env[variable] = found;
  logger.info(`Reading credentials file from: ${found}`);
  return found;
}
