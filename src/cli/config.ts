/**
 * CLI configuration
 *
 * Optional JSON file, `.typefmtrc.json` in the working directory unless
 * `--config` points elsewhere.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";

import { z } from "zod";

import { ConfigError } from "../lib/errors.js";
import { LOG_LEVEL_NAMES } from "../lib/logger.js";
import { err, ok, type Result } from "../lib/result.js";

export const CONFIG_FILE_NAME = ".typefmtrc.json";

/**
 * Configuration schema
 */
export const CliConfigSchema = z
  .object({
    newline: z.boolean().optional(),
    logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Load configuration from disk.
 * A missing default file yields an empty config; a missing explicit file
 * or invalid content is an error.
 */
export function loadConfig(
  explicitPath?: string,
  cwd: string = process.cwd()
): Result<CliConfig, ConfigError> {
  const path = explicitPath ?? join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(path)) {
    return explicitPath === undefined
      ? ok({})
      : err(new ConfigError(`Config file not found: ${path}`, { path }));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    return err(
      new ConfigError(`Config file is not valid JSON: ${path}`, {
        path,
        cause: error instanceof Error ? error.message : String(error),
      })
    );
  }

  const result = CliConfigSchema.safeParse(parsed);
  if (!result.success) {
    return err(
      new ConfigError(`Invalid config file: ${path}`, {
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      })
    );
  }
  return ok(result.data);
}
