/**
 * Raised when the directory pair or the configuration file is unusable.
 * Always thrown before anything is written.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigurationError";
  }
}

/**
 * A single file could not be copied and the run was told to stop on the first failure.
 */
export class CopyError extends Error {
  constructor(
    public sourcePath: string,
    public destPath: string,
    cause: unknown
  ) {
    super(
      `Failed to copy ${sourcePath} -> ${destPath}: ${describeError(cause)}`,
      { cause }
    );
    this.name = "CopyError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system errors carry a string `code` such as ENOENT or EEXIST */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
