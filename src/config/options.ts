import { z } from "zod";

import { INLINE_ARGS } from "../args/argument-store.js";
import { INLINE_BUFFER_SIZE } from "../buffer/growable-buffer.js";
import { ConfigError } from "../lib/errors.js";
import { printfConverter } from "../render/float-converter.js";
import type { FloatConverter } from "../render/types.js";

const FloatConverterSchema = z.custom<FloatConverter>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "convert" in value &&
    typeof value.convert === "function",
  { message: "converter must have a convert(value, directive, out) method" }
);

/**
 * Options for a Formatter
 */
export const FormatterOptionsSchema = z
  .object({
    /** Bytes of output storage allocated up front */
    inlineCapacity: z.number().int().positive().default(INLINE_BUFFER_SIZE),
    /** Arguments stored before spilling to an overflow list */
    inlineArgs: z.number().int().nonnegative().default(INLINE_ARGS),
    /** Converter for floating-point arguments */
    converter: FloatConverterSchema.optional(),
  })
  .strict();

export type FormatterOptions = z.input<typeof FormatterOptionsSchema>;

export interface ResolvedFormatterOptions {
  inlineCapacity: number;
  inlineArgs: number;
  converter: FloatConverter;
}

/**
 * Validate options and fill in defaults
 *
 * @throws ConfigError when an option is invalid
 */
export function resolveOptions(options: FormatterOptions = {}): ResolvedFormatterOptions {
  const result = FormatterOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError("Invalid formatter options", {
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return {
    inlineCapacity: result.data.inlineCapacity,
    inlineArgs: result.data.inlineArgs,
    converter: result.data.converter ?? printfConverter,
  };
}
