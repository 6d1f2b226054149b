import { createWriteStream, statSync, type Dirent, type Stats } from "node:fs";
import { mkdir, open, readdir, realpath, stat, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Readable, Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
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
  hasErrorCode,
  sanitiseKey,
  toBlobKey,
} from "@locus-sdk/common";
import { NOOP_INSTRUMENT, timed, timedIterable } from "@locus-sdk/telemetry";
import { toReadable } from "./transcoding";

const debug = createDebug("locus:storage:file");

export const DEFAULT_BUFFER_SIZE = 64 * 1024;

export type FileBlobStorageOptions = {
  /** Chunk size used when streaming to and from files. */
  bufferSize?: number;
  instrumentation?: Instrumentation;
};

class FileBlob implements Blob {
  constructor(
    readonly key: BlobKey,
    private readonly file: string,
    private readonly bufferSize: number,
  ) {}

  async withStream<T>(fn: (stream: Readable) => T | Promise<T>): Promise<T> {
    let handle: FileHandle;
    try {
      handle = await open(this.file, "r");
    } catch (error) {
      throw new BlobStorageError(`Error streaming blob ${this.key}`, { key: this.key, cause: error });
    }
    const stream = handle.createReadStream({ autoClose: false, highWaterMark: this.bufferSize });
    try {
      return await fn(stream);
    } finally {
      stream.destroy();
      await handle.close();
    }
  }

  toString(): string {
    return `FileBlob {key=${this.key}}`;
  }
}

/**
 * Blob storage over a directory tree. Every key must resolve, after following
 * symbolic links, to a path strictly inside the root.
 */
export class FileBlobStorage implements DeletableBlobStorage {
  readonly rootPath: string;
  private readonly bufferSize: number;
  private readonly instrumentation: Instrumentation;

  constructor(rootPath: string, options: FileBlobStorageOptions = {}) {
    this.rootPath = path.resolve(rootPath);
    this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
    this.instrumentation = options.instrumentation ?? NOOP_INSTRUMENT;

    const stats = statIfExists(this.rootPath);
    if (stats?.isFile()) {
      throw new BlobStorageError(`Root path '${rootPath}' is not valid directory for FileBlobStorage`);
    }
    if (!stats?.isDirectory()) {
      throw new BlobStorageError(`'${rootPath}' refers to a location that doesn't exist.`);
    }
  }

  get storageId(): string {
    return `FileBlobStorage[rootPath='${this.rootPath}']`;
  }

  put(key: BlobKey, data: BlobData): Promise<void> {
    return timed(this.instrumentation, this.metric("put"), async () => {
      const file = await this.resolveKey(key);
      try {
        await mkdir(path.dirname(file), { recursive: true });
        await pipeline(
          toReadable(data),
          createWriteStream(file, { highWaterMark: this.bufferSize }),
        );
      } catch (error) {
        throw new BlobStorageError(`Error putting data with key '${key}'`, { key, cause: error });
      }
    });
  }

  async withPutter<T>(key: BlobKey, fn: (stream: Writable) => T | Promise<T>): Promise<T> {
    const file = await this.resolveKey(key);
    try {
      await mkdir(path.dirname(file), { recursive: true });
    } catch (error) {
      throw new BlobStorageError(`Error creating putter for key '${key}'`, { key, cause: error });
    }

    const stream = createWriteStream(file, { highWaterMark: this.bufferSize });
    // Settles with the stream's error, if any, once the file is closed.
    const closed = finished(stream).then(
      () => undefined,
      (error: unknown) => error,
    );

    let result: T;
    try {
      result = await fn(stream);
    } catch (error) {
      stream.destroy();
      await closed;
      throw error;
    }

    if (!stream.writableEnded) stream.end();
    const failure = await closed;
    if (failure) {
      throw new BlobStorageError(`Error writing blob with key '${key}'`, { key, cause: failure });
    }
    return result;
  }

  get(key: BlobKey): Promise<Blob> {
    return timed(this.instrumentation, this.metric("get"), async () => {
      const file = await this.resolveKey(key);
      let stats: Stats;
      try {
        stats = await stat(file);
      } catch (error) {
        if (hasErrorCode(error, "ENOENT", "ENOTDIR")) throw new BlobNotFoundError(key);
        throw new BlobStorageError(`Error getting data for key '${key}'`, { key, cause: error });
      }
      if (!stats.isFile()) throw new BlobNotFoundError(key);

      // Keyed by the path asked for, not the target of any symbolic link on it.
      const root = await realpath(this.rootPath);
      const logical = path.relative(root, await this.logicalPath(key));
      return new FileBlob(toBlobKey(toPosix(logical)), file, this.bufferSize);
    });
  }

  /** Missing files and directories are ignored. */
  delete(key: BlobKey): Promise<void> {
    return timed(this.instrumentation, this.metric("delete"), async () => {
      await this.resolveKey(key);
      // A symbolic link is removed itself, never its target.
      const file = await this.logicalPath(key);
      try {
        await unlink(file);
      } catch (error) {
        if (hasErrorCode(error, "ENOENT", "EISDIR")) return;
        if (await isDirectory(file)) return;
        throw new BlobStorageError(`Error deleting blob with key '${key}'`, { key, cause: error });
      }
    });
  }

  async namespace(prefix: string): Promise<FileBlobStorage> {
    const directory = await this.resolveKey(prefix);
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new BlobStorageError(`Error namespacing FileBlobStorage for namespace ${prefix}`, {
        key: prefix,
        cause: error,
      });
    }
    return new FileBlobStorage(directory, {
      bufferSize: this.bufferSize,
      instrumentation: this.instrumentation,
    });
  }

  /**
   * Walks the tree afresh on every iteration; order follows the filesystem.
   * Symbolic links to files inside the root are listed under the link's own
   * path. Links to directories are not followed.
   */
  [Symbol.asyncIterator](): AsyncIterator<Blob> {
    return timedIterable(this.instrumentation, this.metric("iterate"), () => this.walk());
  }

  private async *walk(): AsyncGenerator<Blob, void, undefined> {
    let root: string;
    try {
      root = await realpath(this.rootPath);
    } catch (error) {
      throw new BlobStorageError(
        `Error listing contents of FileBlobStorage with root '${this.rootPath}'`,
        { cause: error },
      );
    }
    const pending = [this.rootPath];
    let directory: string | undefined;
    while ((directory = pending.pop()) !== undefined) {
      let entries: Dirent[];
      try {
        entries = await readdir(directory, { withFileTypes: true });
      } catch (error) {
        throw new BlobStorageError(
          `Error listing contents of FileBlobStorage with root '${this.rootPath}'`,
          { cause: error },
        );
      }
      for (const entry of entries) {
        const entryPath = path.join(directory, entry.name);
        if (entry.isDirectory()) {
          pending.push(entryPath);
        } else if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFileIn(root, entryPath)))) {
          const relative = toPosix(path.relative(this.rootPath, entryPath));
          yield new FileBlob(toBlobKey(relative), entryPath, this.bufferSize);
        }
      }
    }
  }

  private metric(operation: string): string {
    return `locus.storage.FileBlobStorage.${operation}`;
  }

  /** The key's path under the real root with no symbolic links followed. Unchecked. */
  private async logicalPath(key: string): Promise<string> {
    return path.resolve(await realpath(this.rootPath), sanitiseKey(key));
  }

  /**
   * Maps a key to an absolute path under the real root.
   *
   * @throws BlobStorageError when the path is the root itself or lies outside it.
   */
  private async resolveKey(key: string): Promise<string> {
    try {
      const root = await realpath(this.rootPath);
      const resolved = await realpathOfDeepest(path.resolve(root, sanitiseKey(key)));
      if (!isStrictlyInside(root, resolved)) {
        debug("rejected key %s resolving to %s", key, resolved);
        throw new BlobStorageError(`Invalid key '${key}'`, { key });
      }
      return resolved;
    } catch (error) {
      if (error instanceof BlobStorageError) throw error;
      throw new BlobStorageError(`Invalid key '${key}'`, { key, cause: error });
    }
  }
}

function isStrictlyInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return !(
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  );
}

/** True when `link` resolves to a regular file strictly inside `root`. Dangling links are skipped. */
async function isLinkedFileIn(root: string, link: string): Promise<boolean> {
  try {
    const target = await realpath(link);
    return isStrictlyInside(root, target) && (await stat(target)).isFile();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR", "ELOOP")) return false;
    throw new BlobStorageError(`Error resolving link '${link}'`, { cause: error });
  }
}

/**
 * Resolves symbolic links in the longest existing prefix of `target` and
 * appends the parts that do not exist yet.
 */
async function realpathOfDeepest(target: string): Promise<string> {
  const missing: string[] = [];
  let current = target;
  for (;;) {
    try {
      const real = await realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (error) {
      const parent = path.dirname(current);
      if (!hasErrorCode(error, "ENOENT", "ENOTDIR") || parent === current) throw error;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function statIfExists(target: string): Stats | undefined {
  try {
    return statSync(target);
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return undefined;
    throw new BlobStorageError(`Unable to access '${target}'`, { cause: error });
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}
