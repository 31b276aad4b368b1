/**
 * Parsed placeholder directive, already checked against the argument kind
 */
export interface FormatSpec {
  /** `+`: print a sign for non-negative values */
  signPlus: boolean;
  /** `0`: pad with zeros after the sign instead of leading spaces */
  zeroPad: boolean;
  /** `#`: prefix hex output with 0x / 0X */
  hexPrefix: boolean;
  /** Minimum rendered length, 0 when absent */
  width: number;
  /** Digits after the point (or significant digits for g), absent when undefined */
  precision: number | undefined;
  /** Single type character, absent when undefined */
  type: string | undefined;
}

export const EMPTY_SPEC: Readonly<FormatSpec> = Object.freeze({
  signPlus: false,
  zeroPad: false,
  hexPrefix: false,
  width: 0,
  precision: undefined,
  type: undefined,
});

export type FloatType = "e" | "E" | "f" | "F" | "g" | "G";

export const FLOAT_TYPES: readonly FloatType[] = ["e", "E", "f", "F", "g", "G"];

export function isFloatType(type: string): type is FloatType {
  return (FLOAT_TYPES as readonly string[]).includes(type);
}

/**
 * Instruction handed to a float converter, the equivalent of a
 * printf conversion such as `%+0*.*Lg`
 */
export interface ConversionDirective {
  signPlus: boolean;
  zeroPad: boolean;
  width: number;
  precision: number | undefined;
  type: FloatType;
  /** Value came from an extended-precision argument */
  extended: boolean;
}

/**
 * Converts a floating-point value to text.
 *
 * Works like snprintf: writes at most `out.length` bytes of the result
 * into `out` and returns the full length of the result, so the caller can
 * grow its buffer and convert again when the return value exceeds the
 * space it offered.
 */
export interface FloatConverter {
  convert(value: number, directive: ConversionDirective, out: Uint8Array): number;
}
