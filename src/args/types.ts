/**
 * Argument model
 *
 * Every value handed to a format call is captured as an immutable,
 * kind-tagged Argument. The kind decides which format specs apply and
 * which renderer runs.
 */

/**
 * Dynamic kind of a captured argument. Numeric kinds come first.
 */
export const ARGUMENT_KINDS = [
  "int",
  "uint",
  "long",
  "ulong",
  "double",
  "longDouble",
  "char",
  "string",
  "pointer",
  "custom",
] as const;

export type ArgumentKind = (typeof ARGUMENT_KINDS)[number];

export interface IntArgument {
  readonly kind: "int";
  readonly value: number;
}

export interface UintArgument {
  readonly kind: "uint";
  readonly value: number;
}

export interface LongArgument {
  readonly kind: "long";
  readonly value: bigint;
}

export interface UlongArgument {
  readonly kind: "ulong";
  readonly value: bigint;
}

export interface DoubleArgument {
  readonly kind: "double" | "longDouble";
  readonly value: number;
}

export interface CharArgument {
  readonly kind: "char";
  /** Character code, 0-127 */
  readonly value: number;
}

export interface StringArgument {
  readonly kind: "string";
  readonly value: Uint8Array;
  /** Byte length, or 0 to stop at the first zero byte */
  readonly size: number;
}

export interface PointerArgument {
  readonly kind: "pointer";
  readonly value: bigint;
}

/**
 * Renders a custom value as text for a requested width.
 * Padding up to the width is applied afterwards, so a renderer may ignore it.
 */
export type CustomRenderer<T> = (value: T, width: number) => string;

export interface CustomArgument {
  readonly kind: "custom";
  readonly value: unknown;
  /** Renderer bound to `value` when the argument was captured */
  readonly render: (width: number) => string;
}

export type IntegerArgument = IntArgument | UintArgument | LongArgument | UlongArgument;

export type Argument =
  | IntegerArgument
  | DoubleArgument
  | CharArgument
  | StringArgument
  | PointerArgument
  | CustomArgument;

/**
 * Objects that know how to render themselves
 */
export const formatSymbol: unique symbol = Symbol.for("typefmt.format");

export interface Formattable {
  [formatSymbol](width: number): string;
}

/**
 * Values accepted by a format session
 */
export type Capturable = number | bigint | string | Uint8Array | Argument | Formattable;

export function isIntegerKind(kind: ArgumentKind): boolean {
  return kind === "int" || kind === "uint" || kind === "long" || kind === "ulong";
}

export function isFloatKind(kind: ArgumentKind): boolean {
  return kind === "double" || kind === "longDouble";
}

export function isNumericKind(kind: ArgumentKind): boolean {
  return isIntegerKind(kind) || isFloatKind(kind);
}

export function isSignedKind(kind: ArgumentKind): boolean {
  return kind === "int" || kind === "long" || isFloatKind(kind);
}

/**
 * Kind name used in "unknown format code" messages
 */
export function kindDisplayName(kind: ArgumentKind): string {
  switch (kind) {
    case "int":
    case "uint":
    case "long":
    case "ulong":
      return "integer";
    case "double":
    case "longDouble":
      return "double";
    case "char":
      return "char";
    case "string":
      return "string";
    case "pointer":
      return "pointer";
    case "custom":
      return "object";
  }
}
