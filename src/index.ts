#!/usr/bin/env node

import { buildApplication, buildCommand, run } from "@stricli/core";
import type { CommandContext } from "@stricli/core";
import { countErrors, folderSync } from "./folder-sync.js";
import { describeError } from "./errors.js";
import { logger } from "./utils/logger.js";

interface SyncFlags {
  config?: string;
  "dry-run": boolean;
  "fail-fast": boolean;
  debug: boolean;
}

const syncCommand = buildCommand({
  docs: {
    brief: "Copy files missing from either of two directory trees into the other, never overwriting",
  },
  parameters: {
    positional: {
      kind: "tuple",
      parameters: [
        {
          brief: "Left directory (overrides config)",
          parse: String,
          placeholder: "left",
          optional: true,
        },
        {
          brief: "Right directory (overrides config)",
          parse: String,
          placeholder: "right",
          optional: true,
        },
      ],
    },
    flags: {
      config: {
        kind: "parsed",
        brief: "Path to configuration file",
        parse: String,
        optional: true,
      },
      "dry-run": {
        kind: "boolean",
        brief: "Preview copies without writing anything",
        default: false,
      },
      "fail-fast": {
        kind: "boolean",
        brief: "Stop at the first file that cannot be copied",
        default: false,
      },
      debug: {
        kind: "boolean",
        brief: "Enable debug logging",
        default: false,
      },
    },
    aliases: {
      c: "config",
      n: "dry-run",
      d: "debug",
    },
  },
  async func(this: CommandContext, flags: SyncFlags, left?: string, right?: string): Promise<void> {
    try {
      const result = await folderSync({
        configPath: flags.config,
        left,
        right,
        dryRun: flags["dry-run"],
        failFast: flags["fail-fast"],
        debug: flags.debug,
      });
      if (countErrors(result) > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error(describeError(error));
      process.exitCode = 1;
    }
  },
});

const app = buildApplication(syncCommand, {
  name: "folder-sync",
  versionInfo: {
    currentVersion: "1.0.0",
  },
});

await run(app, process.argv.slice(2), { process });
