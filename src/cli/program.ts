import { Command } from "commander";

import type { Argument, ArgumentKind } from "../args/types.js";
import { ArgumentError, TypefmtError } from "../lib/errors.js";
import { isLogLevel, logger, type LogLevel } from "../lib/logger.js";
import { checkTemplate } from "../session/check.js";
import { print, type OutputStream } from "../session/entry.js";
import { VERSION } from "../index.js";

import { parseArgumentToken, parseKindList } from "./arg-tokens.js";
import { loadConfig, type CliConfig } from "./config.js";
import { formatCheckResult, formatError, isValidOutputFormat } from "./formatters.js";

export const LOG_LEVEL_ENV = "TYPEFMT_LOG_LEVEL";

/**
 * Where the CLI writes and how it exits
 */
export interface CliIO {
  stdout: OutputStream;
  stderr: (line: string) => void;
  exit: (code: number) => void;
  env: Record<string, string | undefined>;
}

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: (line) => console.error(line),
  exit: (code) => {
    process.exitCode = code;
  },
  env: process.env,
};

const encoder = new TextEncoder();

/**
 * Pick the log level: flags first, then the environment, then the config file
 */
function configureLogging(options: Record<string, unknown>, config: CliConfig, io: CliIO): void {
  let level: LogLevel | undefined = config.logLevel;
  const envLevel = io.env[LOG_LEVEL_ENV];
  if (envLevel !== undefined) {
    if (isLogLevel(envLevel)) {
      level = envLevel;
    } else {
      logger.warn(`Ignoring unknown ${LOG_LEVEL_ENV} value "${envLevel}"`);
    }
  }
  if (options["quiet"] === true) {
    level = "error";
  } else if (options["verbose"] === true) {
    level = "debug";
  }
  if (level !== undefined) {
    logger.configure({ level });
  }
}

function fail(io: CliIO, error: Error): void {
  io.stderr(formatError(error));
  io.exit(1);
}

/**
 * Build the `typefmt` command line program
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("typefmt")
    .description("Type-checked positional string formatting")
    .version(VERSION);

  program
    .command("format <template> [args...]")
    .description("Render a template; arguments are kind:value tokens or bare values")
    .option("--no-newline", "Do not print a trailing newline")
    .option("-c, --config <path>", "Config file (default: .typefmtrc.json)")
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)")
    .action((template: string, tokens: string[], options: Record<string, unknown>, command: Command) => {
      const configPath = typeof options["config"] === "string" ? options["config"] : undefined;
      const configResult = loadConfig(configPath);
      if (!configResult.success) {
        fail(io, configResult.error);
        return;
      }
      const config = configResult.data;
      configureLogging(options, config, io);

      // An explicit flag beats the config file
      const newline =
        command.getOptionValueSource("newline") === "cli"
          ? options["newline"] !== false
          : config.newline ?? true;

      let args: Argument[];
      try {
        args = tokens.map(parseArgumentToken);
      } catch (error) {
        if (error instanceof ArgumentError) {
          fail(io, error);
          return;
        }
        throw error;
      }
      logger.debug(`Formatting "${template}" with ${args.length} argument(s)`);

      try {
        print(template, { stream: io.stdout }).insertAll(args).finish();
      } catch (error) {
        if (error instanceof TypefmtError) {
          fail(io, error);
          return;
        }
        throw error;
      }
      if (newline) {
        io.stdout.write(encoder.encode("\n"));
      }
    });

  program
    .command("check <template>")
    .description("Check a template against a list of argument kinds")
    .option("-k, --kinds <kinds>", "Argument kinds in order (comma-separated)", "")
    .option("-o, --output <format>", "Output format: terminal, json", "terminal")
    .action((template: string, options: Record<string, unknown>) => {
      const output = String(options["output"] ?? "terminal");
      if (!isValidOutputFormat(output)) {
        fail(io, new Error(`Invalid output format: ${output}. Use: terminal, json`));
        return;
      }

      let kinds: ArgumentKind[];
      try {
        kinds = parseKindList(String(options["kinds"] ?? ""));
      } catch (error) {
        if (error instanceof ArgumentError) {
          fail(io, error);
          return;
        }
        throw error;
      }

      const result = checkTemplate(template, kinds);
      const error = result.success ? null : result.error;
      const report = formatCheckResult(template, kinds.length, error, output);
      if (error !== null && output === "terminal") {
        io.stderr(report);
      } else {
        io.stdout.write(encoder.encode(`${report}\n`));
      }
      if (error !== null) {
        io.exit(1);
      }
    });

  return program;
}
