import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { errorCode } from "../errors.js";

/**
 * Check whether a path exists and is a directory (symlinks are followed)
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    return stats.isDirectory();
  } catch (error) {
    if (errorCode(error) === "ENOENT" || errorCode(error) === "ENOTDIR") {
      return false;
    }
    throw error;
  }
}

/**
 * Check that the current user may both list and write into a directory
 */
export async function canReadAndWrite(dirPath: string): Promise<boolean> {
  try {
    await fs.access(dirPath, constants.R_OK | constants.W_OK);
    return true;
  } catch (error) {
    const code = errorCode(error);
    if (code === "EACCES" || code === "EPERM" || code === "EROFS") {
      return false;
    }
    throw error;
  }
}

/**
 * Check whether anything (file, directory, dangling symlink) occupies a path
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Copy a file without ever replacing an existing destination, then carry over
 * the source's permission bits and access/modification times.
 *
 * Missing parent directories of `destPath` are created.
 *
 * @returns false when the destination already existed and nothing was written
 */
export async function copyFileExclusive(sourcePath: string, destPath: string): Promise<boolean> {
  await fs.mkdir(path.dirname(destPath), { recursive: true });

  const stats = await fs.stat(sourcePath);
  try {
    await fs.copyFile(sourcePath, destPath, constants.COPYFILE_EXCL);
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  }

  await fs.chmod(destPath, stats.mode & 0o7777);
  await fs.utimes(destPath, stats.atime, stats.mtime);
  return true;
}
