/**
 * Argument rendering
 *
 * - integer.ts         - decimal, hex and octal integers
 * - float.ts           - floating point through a pluggable converter
 * - float-converter.ts - built-in printf-compatible converter
 * - renderer.ts        - dispatch by argument kind
 */

export { ArgumentRenderer, textLength } from "./renderer.js";
export { formatInteger, type IntegerSpec } from "./integer.js";
export { formatDouble } from "./float.js";
export { printfConverter, convertToText, describeDirective } from "./float-converter.js";
export { unknownTypeError } from "./errors.js";
export {
  EMPTY_SPEC,
  FLOAT_TYPES,
  isFloatType,
  type FormatSpec,
  type FloatType,
  type ConversionDirective,
  type FloatConverter,
} from "./types.js";
