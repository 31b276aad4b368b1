import type { Capturable } from "../args/types.js";
import type { FormatterOptions } from "../config/options.js";
import { TypefmtError } from "../lib/errors.js";
import { err, ok, type Result } from "../lib/result.js";

import { Formatter } from "./formatter.js";
import type { FormatSession } from "./session.js";

/**
 * Destination for `print`
 */
export interface OutputStream {
  write(chunk: Uint8Array): unknown;
}

export interface PrintOptions extends FormatterOptions {
  /** Defaults to process.stdout */
  stream?: OutputStream;
}

/**
 * Start a format call with its own buffer. Nothing is rendered until
 * the session is finished.
 */
export function begin(template: string, options?: FormatterOptions): FormatSession {
  return new Formatter(options).format(template);
}

/**
 * Like `begin`, but finishing the session also writes the output to a stream
 *
 * @example
 * ```typescript
 * print("Elapsed time: {0:.2f} seconds\n").insert(1.23).finish();
 * ```
 */
export function print(template: string, options: PrintOptions = {}): FormatSession {
  const { stream = process.stdout, ...formatterOptions } = options;
  return new Formatter(formatterOptions).format(template, (output) => {
    stream.write(output.slice());
  });
}

/**
 * Format a template with the given arguments in one call.
 *
 * Bare numbers are classified by value, so a whole number becomes an
 * integer argument. Wrap values in `double()` when a placeholder uses a
 * precision or a floating-point type: `format("{0:.2f}", double(total))`.
 *
 * @throws FormatError when the template does not match the arguments
 * @throws ArgumentError when an argument cannot be captured
 */
export function format(template: string, ...args: Capturable[]): string {
  return begin(template).insertAll(args).text();
}

/**
 * Like `format`, but returns a Result instead of throwing typefmt errors
 */
export function tryFormat(template: string, ...args: Capturable[]): Result<string, TypefmtError> {
  try {
    return ok(format(template, ...args));
  } catch (error) {
    if (error instanceof TypefmtError) {
      return err(error);
    }
    throw error;
  }
}
