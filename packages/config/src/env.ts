import os from "node:os";
import path from "node:path";

export const DEFAULT_FEATURES_CONFIG = "features.json";
export const USER_CONFIG_DIR = ".locus";

export class LocusConfig {
  /** Name of the features config file, from `FEATURES_CONFIG`. */
  static getFeaturesConfigName(): string {
    return process.env.FEATURES_CONFIG || DEFAULT_FEATURES_CONFIG;
  }

  /** Per-user config directory searched after the working directory. */
  static getUserConfigDir(): string {
    return path.join(os.homedir(), USER_CONFIG_DIR);
  }
}
