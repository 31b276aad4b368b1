import chalk from "chalk";

import type { TypefmtError } from "../lib/errors.js";

/**
 * Output format types
 */
export type OutputFormat = "terminal" | "json";

export function isValidOutputFormat(format: string): format is OutputFormat {
  return ["terminal", "json"].includes(format);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error): string {
  return chalk.red(`Error: ${error.message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string): string {
  return chalk.green(`✓ ${message}`);
}

/**
 * Result of `typefmt check` in the requested output format
 */
export function formatCheckResult(
  template: string,
  argumentCount: number,
  error: TypefmtError | null,
  output: OutputFormat
): string {
  if (output === "json") {
    return JSON.stringify(
      error === null
        ? { template, valid: true }
        : { template, valid: false, error: error.toJSON() },
      null,
      2
    );
  }
  if (error !== null) {
    return formatError(error);
  }
  const plural = argumentCount === 1 ? "" : "s";
  return formatSuccess(`Template is valid for ${argumentCount} argument${plural}`);
}
