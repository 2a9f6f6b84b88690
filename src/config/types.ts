/**
 * What to do when a single file cannot be copied:
 * - skip: warn, record the failure and carry on with the sweep
 * - abort: stop the whole run on the first failure
 */
export type ErrorPolicy = "skip" | "abort";

/**
 * Configuration for folder sync
 */
export interface SyncConfig {
  /** First directory of the pair (null = must come from the command line) */
  left: string | null;

  /** Second directory of the pair (null = must come from the command line) */
  right: string | null;

  /** Report what would be copied without touching either tree */
  dryRun: boolean;

  /** Per-file failure handling */
  errorPolicy: ErrorPolicy;

  /** Directory names skipped on both sides (case-insensitive, e.g. [".git"]) */
  excludeDirs: string[];
}
