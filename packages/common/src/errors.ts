export class LocusError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LocusError";
  }
}

/** Base class for service locator errors. */
export class FeatureError extends LocusError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FeatureError";
  }
}

export class FeatureNotFoundError extends FeatureError {
  constructor(
    public readonly feature: string,
    options?: ErrorOptions,
  ) {
    super(`Feature ${feature} was not found in factory map`, options);
    this.name = "FeatureNotFoundError";
  }
}

export class MultipleFeatureDefaultsError extends FeatureError {
  constructor(
    public readonly interfaceId: string,
    options?: ErrorOptions,
  ) {
    super(`Multiple definitions set as 'default' for ${interfaceId}`, options);
    this.name = "MultipleFeatureDefaultsError";
  }
}

export class InvalidReturnTypeError extends FeatureError {
  constructor(
    public readonly interfaceId: string,
    options?: ErrorOptions,
  ) {
    super(`Object type doesn't match the expected type ${interfaceId}`, options);
    this.name = "InvalidReturnTypeError";
  }
}

export class FeatureConfigError extends FeatureError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FeatureConfigError";
  }
}

export class ConfigFileNotFoundError extends FeatureConfigError {
  constructor(
    public readonly fileName: string,
    public readonly searchPaths: readonly string[],
  ) {
    super(`${fileName} doesn't exist in [${searchPaths.map((p) => `'${p}'`).join(", ")}]`);
    this.name = "ConfigFileNotFoundError";
  }
}

export class FactoryLoadError extends FeatureError {
  constructor(
    public readonly factoryId: string,
    options?: ErrorOptions,
  ) {
    super(
      `No factory registered for '${factoryId}'. ` +
        "Register it with registry.register() before the locator instantiates it.",
      options,
    );
    this.name = "FactoryLoadError";
  }
}

export type BlobStorageErrorOptions = ErrorOptions & {
  key?: string;
};

export class BlobStorageError extends LocusError {
  public readonly key?: string;

  constructor(message: string, options?: BlobStorageErrorOptions) {
    super(message, options);
    this.name = "BlobStorageError";
    this.key = options?.key;
  }
}

export class BlobNotFoundError extends BlobStorageError {
  constructor(key: string, options?: ErrorOptions) {
    super(`Blob for key '${key}' does not exist`, { ...options, key });
    this.name = "BlobNotFoundError";
  }
}

/** True when `error` is a Node system error carrying one of the given codes (e.g. `ENOENT`). */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}
