import fs from "node:fs/promises";
import path from "node:path";
import type { ErrorPolicy, SyncConfig } from "./types.js";
import { DEFAULT_CONFIG_FILE, defaultConfig } from "./defaults.js";
import { ConfigurationError, describeError, errorCode } from "../errors.js";
import { logger } from "../utils/logger.js";

const ERROR_POLICIES: readonly ErrorPolicy[] = ["skip", "abort"];

/**
 * Loads configuration from a JSON file and merges it over the defaults.
 *
 * An explicit `configPath` must exist. Without one, `folder-sync.json` in the
 * current directory is used when present and the defaults otherwise.
 */
export async function loadConfig(configPath?: string): Promise<SyncConfig> {
  const resolved = resolveConfigPath(configPath);

  let content: string;
  try {
    content = await fs.readFile(resolved, "utf-8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      if (configPath === undefined) {
        logger.debug(`No ${DEFAULT_CONFIG_FILE} found, using defaults`);
        return { ...defaultConfig, excludeDirs: [...defaultConfig.excludeDirs] };
      }
      throw new ConfigurationError(`configuration file not found: ${resolved}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`invalid JSON in ${resolved}: ${describeError(error)}`);
  }

  logger.debug(`Loaded config from: ${resolved}`);
  return { ...defaultConfig, excludeDirs: [...defaultConfig.excludeDirs], ...parseConfig(raw) };
}

/**
 * Checks the shape of a parsed config file field by field
 * @throws ConfigurationError on the first invalid field
 */
export function parseConfig(raw: unknown): Partial<SyncConfig> {
  if (!isRecord(raw)) {
    throw new ConfigurationError("configuration must be a JSON object");
  }

  const config: Partial<SyncConfig> = {};

  for (const key of ["left", "right"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (value === null || typeof value === "string") {
      config[key] = value;
    } else {
      throw new ConfigurationError(`${key} must be a directory path`);
    }
  }

  if (raw.dryRun !== undefined) {
    if (typeof raw.dryRun !== "boolean") {
      throw new ConfigurationError("dryRun must be true or false");
    }
    config.dryRun = raw.dryRun;
  }

  if (raw.errorPolicy !== undefined) {
    const policy = ERROR_POLICIES.find((p) => p === raw.errorPolicy);
    if (!policy) {
      throw new ConfigurationError('errorPolicy must be "skip" or "abort"');
    }
    config.errorPolicy = policy;
  }

  if (raw.excludeDirs !== undefined) {
    const dirs = raw.excludeDirs;
    if (!Array.isArray(dirs) || !dirs.every((d): d is string => typeof d === "string")) {
      throw new ConfigurationError("excludeDirs must be an array of directory names");
    }
    config.excludeDirs = [...dirs];
  }

  return config;
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  return path.resolve(DEFAULT_CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
