import type { ErrorPolicy } from "../config/types.js";

export interface SyncOptions {
  dryRun?: boolean;
  errorPolicy?: ErrorPolicy;
  excludeDirs?: string[];
}

/**
 * Outcome of one directional sweep
 */
export interface SweepResult {
  source: string;
  dest: string;
  /** Files copied (or, in a dry run, that would have been) */
  copied: number;
  /** Files already present at the destination */
  skipped: number;
  /** Symlinks and special files left alone */
  ignored: number;
  /** One message per file or directory that failed under the skip policy */
  errors: string[];
}

export interface SyncResult {
  leftToRight: SweepResult;
  rightToLeft: SweepResult;
}
