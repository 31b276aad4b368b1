/**
 * Argument capture
 *
 * Typed constructors for every argument kind, automatic classification
 * of bare values and the ordered store a format call renders against.
 *
 * @example
 * ```typescript
 * import { uint, double, capture } from "typefmt";
 *
 * capture(42);       // { kind: "int", value: 42 }
 * uint(42);          // { kind: "uint", value: 42 }
 * double(2);         // { kind: "double", value: 2 }
 * ```
 */

export {
  ARGUMENT_KINDS,
  formatSymbol,
  isIntegerKind,
  isFloatKind,
  isNumericKind,
  isSignedKind,
  kindDisplayName,
  type Argument,
  type ArgumentKind,
  type Capturable,
  type CharArgument,
  type CustomArgument,
  type CustomRenderer,
  type DoubleArgument,
  type Formattable,
  type IntArgument,
  type IntegerArgument,
  type LongArgument,
  type PointerArgument,
  type StringArgument,
  type UintArgument,
  type UlongArgument,
} from "./types.js";

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
  INT32_MIN,
  INT32_MAX,
  UINT32_MAX,
  INT64_MIN,
  INT64_MAX,
  UINT64_MAX,
} from "./capture.js";

export { ArgumentStore, INLINE_ARGS } from "./argument-store.js";
