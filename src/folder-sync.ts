import { loadConfig } from "./config/config.js";
import type { SyncConfig } from "./config/types.js";
import { syncFolders } from "./copier/missing-file-copier.js";
import type { SyncResult } from "./copier/types.js";
import { ConfigurationError } from "./errors.js";
import { logger } from "./utils/logger.js";

export interface FolderSyncOptions {
  configPath?: string;
  left?: string;
  right?: string;
  dryRun?: boolean;
  failFast?: boolean;
  debug?: boolean;
}

/**
 * Main entry point: load configuration, apply command-line overrides and
 * sync the resulting directory pair.
 */
export async function folderSync(options: FolderSyncOptions = {}): Promise<SyncResult> {
  if (options.debug) {
    logger.setDebug(true);
  }

  const config = applyOverrides(await loadConfig(options.configPath), options);
  const { left, right } = config;
  if (!left || !right) {
    throw new ConfigurationError(
      "both a left and a right directory are required (pass them as arguments or set them in the config file)"
    );
  }

  logger.debug(`Left:  ${left}`);
  logger.debug(`Right: ${right}`);
  logger.debug(`Error policy: ${config.errorPolicy}`);

  return syncFolders(left, right, {
    dryRun: config.dryRun,
    errorPolicy: config.errorPolicy,
    excludeDirs: config.excludeDirs,
  });
}

/**
 * Command-line values win over the config file
 */
export function applyOverrides(config: SyncConfig, options: FolderSyncOptions): SyncConfig {
  return {
    ...config,
    left: options.left ?? config.left,
    right: options.right ?? config.right,
    dryRun: options.dryRun || config.dryRun,
    errorPolicy: options.failFast ? "abort" : config.errorPolicy,
  };
}

/** Total per-file failures recorded across both sweeps */
export function countErrors(result: SyncResult): number {
  return result.leftToRight.errors.length + result.rightToLeft.errors.length;
}
