import { statSync } from "node:fs";
import path from "node:path";
import { ConfigFileNotFoundError, hasErrorCode } from "@locus-sdk/common";
import { LocusConfig } from "./env";

/** The working directory, then the per-user config directory. */
export function currentOrHome(): string[] {
  return [process.cwd(), LocusConfig.getUserConfigDir()];
}

/** Finds files by searching an ordered list of directories. */
export class FileLocator {
  constructor(private readonly paths: readonly string[]) {}

  /** @throws ConfigFileNotFoundError when no directory holds a regular file of that name. */
  findFile(fileName: string): string {
    const found = this.findOptional(fileName);
    if (found === undefined) {
      throw new ConfigFileNotFoundError(fileName, this.paths);
    }
    return found;
  }

  findOptional(fileName: string): string | undefined {
    for (const directory of this.paths) {
      const candidate = path.resolve(directory, fileName);
      if (isFile(candidate)) return candidate;
    }
    return undefined;
  }

  static find(paths: readonly string[], fileName: string): string {
    return new FileLocator(paths).findFile(fileName);
  }
}

function isFile(candidate: string): boolean {
  try {
    return statSync(candidate).isFile();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return false;
    throw error;
  }
}
