import fs from "node:fs/promises";
import path from "node:path";
import { walkTree } from "../utils/file-walker.js";
import { canReadAndWrite, copyFileExclusive, isDirectory, pathExists } from "../utils/fs-utils.js";
import { logger } from "../utils/logger.js";
import { ConfigurationError, CopyError, describeError } from "../errors.js";
import type { SweepResult, SyncOptions, SyncResult } from "./types.js";

/**
 * Fill the gaps between two directory trees: every file found under one root
 * but missing at the same relative path under the other is copied across.
 * Existing files are never touched, whatever their content.
 *
 * Runs left -> right, then right -> left.
 *
 * @throws ConfigurationError before any write if either path is not a
 * readable and writable directory, or one directory contains the other
 * @throws CopyError on the first failed file when `errorPolicy` is "abort"
 */
export async function syncFolders(
  left: string,
  right: string,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const leftRoot = path.resolve(left);
  const rightRoot = path.resolve(right);

  await assertDirectory(leftRoot, "left");
  await assertDirectory(rightRoot, "right");
  // real paths, since a symlinked root may point into the other tree
  if (isSameOrNested(await fs.realpath(leftRoot), await fs.realpath(rightRoot))) {
    throw new ConfigurationError(
      `directories must not contain each other: ${leftRoot}, ${rightRoot}`
    );
  }

  const leftToRight = await propagate(leftRoot, rightRoot, options);
  const rightToLeft = await propagate(rightRoot, leftRoot, options);

  const copied = leftToRight.copied + rightToLeft.copied;
  const skipped = leftToRight.skipped + rightToLeft.skipped;
  const errors = leftToRight.errors.length + rightToLeft.errors.length;
  logger.success(
    `${options.dryRun ? "Dry run" : "Sync"} complete: ${copied} copied, ${skipped} already present, ${errors} errors`
  );

  return { leftToRight, rightToLeft };
}

/**
 * One directional sweep: copy every file under `source` whose relative path
 * does not exist under `dest`, creating destination directories on the way.
 */
export async function propagate(
  source: string,
  dest: string,
  options: SyncOptions = {}
): Promise<SweepResult> {
  const { dryRun = false, errorPolicy = "skip", excludeDirs = [] } = options;
  const result: SweepResult = { source, dest, copied: 0, skipped: 0, ignored: 0, errors: [] };

  const fail = (sourcePath: string, destPath: string, error: unknown): void => {
    if (errorPolicy === "abort") {
      throw new CopyError(sourcePath, destPath, error);
    }
    const message = `${sourcePath}: ${describeError(error)}`;
    logger.warn(`Skipping ${message}`);
    result.errors.push(message);
  };

  logger.debug(`Sweeping ${source} -> ${dest}`);

  await walkTree(
    source,
    {
      onFile: async ({ relativePath, absolutePath }) => {
        const destPath = path.join(dest, relativePath);
        try {
          if (await pathExists(destPath)) {
            result.skipped++;
            return;
          }

          if (dryRun) {
            logger.info(`Would copy: ${absolutePath} -> ${destPath}`);
            result.copied++;
            return;
          }

          if (await copyFileExclusive(absolutePath, destPath)) {
            logger.info(`Copied: ${absolutePath} -> ${destPath}`);
            result.copied++;
          } else {
            // appeared after the existence check
            result.skipped++;
          }
        } catch (error) {
          fail(absolutePath, destPath, error);
        }
      },
      onIgnored: (absolutePath, kind) => {
        logger.debug(`Ignoring ${kind}: ${absolutePath}`);
        result.ignored++;
      },
      onDirectoryError: (dirPath, error) => {
        fail(dirPath, path.join(dest, path.relative(source, dirPath)), error);
      },
    },
    { excludeDirs }
  );

  logger.debug(
    `Swept ${source} -> ${dest}: ${result.copied} copied, ${result.skipped} skipped, ${result.ignored} ignored`
  );
  return result;
}

async function assertDirectory(dirPath: string, label: string): Promise<void> {
  if (!(await isDirectory(dirPath))) {
    throw new ConfigurationError(`${label} directory does not exist or is not a directory: ${dirPath}`);
  }
  if (!(await canReadAndWrite(dirPath))) {
    throw new ConfigurationError(`${label} directory must be readable and writable: ${dirPath}`);
  }
}

function isSameOrNested(a: string, b: string): boolean {
  return isInside(a, b) || isInside(b, a);
}

function isInside(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative));
}
