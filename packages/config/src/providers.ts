import { readFileSync } from "node:fs";
import path from "node:path";
import createDebug from "debug";
import dotenv from "dotenv";
import type { PropertyProvider } from "@locus-sdk/types";
import { FeatureConfigError, hasErrorCode } from "@locus-sdk/common";

const debug = createDebug("locus:config:providers");

/**
 * Reads `--NAME=value` command line arguments.
 * Defaults to `process.argv` as it is at lookup time.
 */
export function commandLineProvider(argv?: readonly string[]): PropertyProvider {
  return (name) => {
    const prefix = `--${name}=`;
    const match = (argv ?? process.argv).find((arg) => arg.startsWith(prefix));
    return match?.slice(prefix.length);
  };
}

export function environmentProvider(env?: NodeJS.ProcessEnv): PropertyProvider {
  return (name) => (env ?? process.env)[name];
}

/**
 * Reads `NAME=value` lines from a dotenv file, `.env` in the working directory
 * by default. The file is read on every lookup and never applied to `process.env`.
 */
export function dotEnvProvider(filePath = ".env"): PropertyProvider {
  return (name) => {
    const absolute = path.resolve(filePath);
    let contents: string;
    try {
      contents = readFileSync(absolute, "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return undefined;
      throw new FeatureConfigError(`Unable to read properties from '${absolute}'`, {
        cause: error,
      });
    }
    debug("looking up %s in %s", name, absolute);
    return dotenv.parse(contents)[name];
  };
}

/** Command line, then environment, then `.env`. */
export const STANDARD_PROVIDERS: readonly PropertyProvider[] = [
  commandLineProvider(),
  environmentProvider(),
  dotEnvProvider(),
];
