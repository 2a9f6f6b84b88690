import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

/** A file identified by its path below the tree root */
export interface RelativeFileEntry {
  relativePath: string;
  absolutePath: string;
}

export interface WalkOptions {
  /** Directory names to skip, compared case-insensitively (e.g. [".git"]) */
  excludeDirs?: string[];
}

export interface WalkHandlers {
  /** Called once per regular file, awaited before the walk continues */
  onFile: (entry: RelativeFileEntry) => Promise<void>;
  /** Symlinks, sockets, FIFOs and devices */
  onIgnored?: (absolutePath: string, kind: string) => void;
  /** A directory (the root included) could not be read; throw to stop the walk */
  onDirectoryError: (dirPath: string, error: unknown) => void;
}

/**
 * Recursively walks `root`, handing every regular file to `onFile`.
 *
 * Unreadable directories, `root` included, go to `onDirectoryError`.
 * Symbolic links are reported, never followed.
 */
export async function walkTree(
  root: string,
  handlers: WalkHandlers,
  options: WalkOptions = {}
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    handlers.onDirectoryError(root, error);
    return;
  }
  await walkEntries(root, "", entries, handlers, options);
}

async function walkEntries(
  root: string,
  relativeDir: string,
  entries: Dirent[],
  handlers: WalkHandlers,
  options: WalkOptions
): Promise<void> {
  for (const entry of entries) {
    const relativePath = path.join(relativeDir, entry.name);
    const absolutePath = path.join(root, relativePath);

    if (entry.isDirectory()) {
      if (shouldExcludeDirectory(entry.name, options)) {
        logger.debug(`Excluding directory: ${absolutePath}`);
        continue;
      }

      let children: Dirent[];
      try {
        children = await fs.readdir(absolutePath, { withFileTypes: true });
      } catch (error) {
        handlers.onDirectoryError(absolutePath, error);
        continue;
      }
      await walkEntries(root, relativePath, children, handlers, options);
    } else if (entry.isFile()) {
      await handlers.onFile({ relativePath, absolutePath });
    } else {
      handlers.onIgnored?.(absolutePath, describeEntryKind(entry));
    }
  }
}

/**
 * Determines if a directory should be excluded
 */
function shouldExcludeDirectory(dirName: string, options: WalkOptions): boolean {
  if (!options.excludeDirs || options.excludeDirs.length === 0) {
    return false;
  }

  // Case-insensitive comparison
  const lowerDirName = dirName.toLowerCase();
  return options.excludeDirs.some((excluded) => excluded.toLowerCase() === lowerDirName);
}

function describeEntryKind(entry: Dirent): string {
  if (entry.isSymbolicLink()) return "symlink";
  if (entry.isSocket()) return "socket";
  if (entry.isFIFO()) return "fifo";
  if (entry.isBlockDevice() || entry.isCharacterDevice()) return "device";
  return "unknown";
}
