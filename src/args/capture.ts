import { z } from "zod";

import { ArgumentError } from "../lib/errors.js";

import {
  formatSymbol,
  type Argument,
  type Capturable,
  type CharArgument,
  type CustomArgument,
  type CustomRenderer,
  type DoubleArgument,
  type Formattable,
  type IntArgument,
  type LongArgument,
  type PointerArgument,
  type StringArgument,
  type UintArgument,
  type UlongArgument,
} from "./types.js";

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;
export const UINT32_MAX = 0xffffffff;
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

const Int32Schema = z.number().int().min(INT32_MIN).max(INT32_MAX);
const Uint32Schema = z.number().int().min(0).max(UINT32_MAX);
const Int64Schema = z.bigint().min(INT64_MIN).max(INT64_MAX);
const Uint64Schema = z.bigint().min(0n).max(UINT64_MAX);
const SafeIntegerSchema = z.number().int().refine(Number.isSafeInteger, "must be a safe integer");
const CharCodeSchema = z.number().int().min(0).max(0x7f);

const encoder = new TextEncoder();

/**
 * Arguments built by the constructors below. Anything else that looks
 * like an argument is a plain object and gets rejected.
 */
const captured = new WeakSet<object>();

function seal<T extends Argument>(arg: T): T {
  Object.freeze(arg);
  captured.add(arg);
  return arg;
}

function check<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ArgumentError(`${String(value)} is not a valid ${what}`, {
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

function toBigInt(value: bigint | number, what: string): bigint {
  return typeof value === "bigint" ? value : BigInt(check(SafeIntegerSchema, value, what));
}

/** 32-bit signed integer */
export function int(value: number): IntArgument {
  return seal({ kind: "int", value: check(Int32Schema, value, "32-bit signed integer") });
}

/** 32-bit unsigned integer */
export function uint(value: number): UintArgument {
  return seal({ kind: "uint", value: check(Uint32Schema, value, "32-bit unsigned integer") });
}

/** 64-bit signed integer */
export function long(value: bigint | number): LongArgument {
  const what = "64-bit signed integer";
  return seal({ kind: "long", value: check(Int64Schema, toBigInt(value, what), what) });
}

/** 64-bit unsigned integer */
export function ulong(value: bigint | number): UlongArgument {
  const what = "64-bit unsigned integer";
  return seal({ kind: "ulong", value: check(Uint64Schema, toBigInt(value, what), what) });
}

export function double(value: number): DoubleArgument {
  return seal({ kind: "double", value });
}

/**
 * Floating-point value flagged for extended precision conversion
 */
export function longDouble(value: number): DoubleArgument {
  return seal({ kind: "longDouble", value });
}

/**
 * Single-byte character. Wider characters have to be passed as integers.
 */
export function char(value: string | number): CharArgument {
  let code: number;
  if (typeof value === "string") {
    const codePoint = value.codePointAt(0);
    if (codePoint === undefined || [...value].length !== 1) {
      throw new ArgumentError(`Expected a single character, got ${JSON.stringify(value)}`);
    }
    code = codePoint;
  } else {
    code = value;
  }
  if (!CharCodeSchema.safeParse(code).success) {
    throw new ArgumentError(
      `Cannot capture wide character ${String(code)}; convert it to an integer first`,
      { code }
    );
  }
  return seal({ kind: "char", value: code });
}

/**
 * Text argument. Strings are captured as UTF-8 with their full length.
 * For byte arrays a size of 0 means "up to the first zero byte".
 */
export function str(value: string | Uint8Array, size?: number): StringArgument {
  if (typeof value === "string") {
    const bytes = encoder.encode(value);
    return seal({ kind: "string", value: bytes, size: bytes.length });
  }
  const length = size ?? 0;
  if (!Number.isInteger(length) || length < 0 || length > value.length) {
    throw new ArgumentError(`Text size ${String(size)} is outside the ${value.length}-byte slice`);
  }
  return seal({ kind: "string", value, size: length });
}

/**
 * Address rendered as 0x-prefixed hex
 */
export function pointer(address: bigint | number): PointerArgument {
  const what = "pointer address";
  return seal({ kind: "pointer", value: check(Uint64Schema, toBigInt(address, what), what) });
}

/**
 * Default stringification for custom values
 */
export function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint" ||
    value === null ||
    value === undefined
  ) {
    return String(value);
  }
  if (typeof value === "object" && value.toString !== Object.prototype.toString) {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Value of any type with a renderer chosen by the caller
 */
export function custom<T>(value: T, render: CustomRenderer<T> = stringify): CustomArgument {
  return seal({ kind: "custom", value, render: (width: number) => render(value, width) });
}

export function isArgument(value: unknown): value is Argument {
  return typeof value === "object" && value !== null && captured.has(value);
}

export function isFormattable(value: unknown): value is Formattable {
  return (
    typeof value === "object" &&
    value !== null &&
    formatSymbol in value &&
    typeof value[formatSymbol] === "function"
  );
}

/**
 * Classify a bare value into an argument.
 *
 * Integral numbers become `int` (or `long` beyond 32 bits), other numbers
 * `double`. The choice depends on the value, not on how it was computed.
 * Bigints become `long`, or `ulong` above the signed range.
 */
export function capture(value: Capturable): Argument {
  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) {
      return value >= INT32_MIN && value <= INT32_MAX ? int(value) : long(value);
    }
    return double(value);
  }
  if (typeof value === "bigint") {
    return value > INT64_MAX ? ulong(value) : long(value);
  }
  if (typeof value === "string" || value instanceof Uint8Array) {
    return str(value);
  }
  if (isArgument(value)) {
    return value;
  }
  if (isFormattable(value)) {
    return custom(value, (target, width) => target[formatSymbol](width));
  }
  return reject(value);
}

function reject(value: unknown): never {
  const type = value === null ? "null" : typeof value;
  throw new ArgumentError(
    `Cannot capture a value of type ${type}; wrap it with custom() to give it a renderer`,
    { type }
  );
}
