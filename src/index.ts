/**
 * typefmt - type-checked positional string formatting
 *
 * Templates use `{index[:spec]}` placeholders; every argument is captured
 * with its kind and the spec is checked against that kind when the
 * template is rendered.
 *
 * @packageDocumentation
 */

export const VERSION = "0.1.0";

// Sessions and entry points
export {
  begin,
  print,
  format,
  tryFormat,
  checkTemplate,
  Formatter,
  FormatSession,
  type FinalizeAction,
  type OutputStream,
  type PrintOptions,
} from "./session/index.js";

// Arguments
export {
  int,
  uint,
  long,
  ulong,
  double,
  longDouble,
  char,
  str,
  pointer,
  custom,
  capture,
  stringify,
  isArgument,
  isFormattable,
  formatSymbol,
  ArgumentStore,
  ARGUMENT_KINDS,
  INLINE_ARGS,
} from "./args/index.js";

export type {
  Argument,
  ArgumentKind,
  Capturable,
  CustomRenderer,
  Formattable,
} from "./args/index.js";

// Buffer, parser and renderers
export { GrowableBuffer, INLINE_BUFFER_SIZE } from "./buffer/index.js";
export { TemplateParser } from "./template/index.js";
export {
  ArgumentRenderer,
  printfConverter,
  convertToText,
  describeDirective,
} from "./render/index.js";

export type { FormatSpec, ConversionDirective, FloatConverter, FloatType } from "./render/index.js";

// Configuration
export { FormatterOptionsSchema, resolveOptions } from "./config/index.js";
export type { FormatterOptions, ResolvedFormatterOptions } from "./config/index.js";

// Library utilities
export {
  // Errors
  TypefmtError,
  FormatError,
  ArgumentError,
  SessionError,
  ConfigError,
  // Result utilities
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
  // Logger
  logger,
} from "./lib/index.js";

export type { Result, LogLevel } from "./lib/index.js";
