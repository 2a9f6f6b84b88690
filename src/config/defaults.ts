import type { SyncConfig } from "./types.js";

/** Name of the config file picked up from the working directory */
export const DEFAULT_CONFIG_FILE = "folder-sync.json";

/**
 * Default configuration values
 */
export const defaultConfig: SyncConfig = {
  left: null,
  right: null,
  dryRun: false,
  errorPolicy: "skip",
  excludeDirs: [],
};
