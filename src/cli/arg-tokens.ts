import { capture, char, double, int, long, longDouble, pointer, str, uint, ulong } from "../args/capture.js";
import type { Argument, ArgumentKind } from "../args/types.js";
import { ArgumentError } from "../lib/errors.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function parseInteger(text: string): number {
  if (!INTEGER_PATTERN.test(text)) {
    throw new ArgumentError(`Expected an integer, got "${text}"`);
  }
  return Number(text);
}

function parseBigInt(text: string): bigint {
  try {
    return BigInt(text);
  } catch {
    throw new ArgumentError(`Expected an integer, got "${text}"`);
  }
}

function parseFloatText(text: string): number {
  const lower = text.toLowerCase();
  if (lower === "nan") {
    return NaN;
  }
  if (lower === "inf" || lower === "+inf") {
    return Infinity;
  }
  if (lower === "-inf") {
    return -Infinity;
  }
  if (!NUMBER_PATTERN.test(text)) {
    throw new ArgumentError(`Expected a number, got "${text}"`);
  }
  return Number(text);
}

/**
 * Argument constructors by token prefix
 */
const TOKEN_PARSERS: Record<string, (text: string) => Argument> = {
  int: (text) => int(parseInteger(text)),
  uint: (text) => uint(parseInteger(text)),
  long: (text) => long(parseBigInt(text)),
  ulong: (text) => ulong(parseBigInt(text)),
  double: (text) => double(parseFloatText(text)),
  ldouble: (text) => longDouble(parseFloatText(text)),
  char: (text) => char(text),
  str: (text) => str(text),
  ptr: (text) => pointer(parseBigInt(text)),
};

/**
 * Kind names accepted by `typefmt check --kinds`
 */
const KIND_ALIASES: Record<string, ArgumentKind> = {
  int: "int",
  uint: "uint",
  long: "long",
  ulong: "ulong",
  double: "double",
  ldouble: "longDouble",
  longDouble: "longDouble",
  char: "char",
  str: "string",
  string: "string",
  ptr: "pointer",
  pointer: "pointer",
  custom: "custom",
  object: "custom",
};

/**
 * Turn a command line token into an argument.
 *
 * `kind:value` picks the kind explicitly. Other tokens are classified:
 * integers become `int` (or `long` when large), other numbers `double`,
 * everything else text.
 */
export function parseArgumentToken(token: string): Argument {
  const colon = token.indexOf(":");
  if (colon > 0) {
    const parser = TOKEN_PARSERS[token.slice(0, colon)];
    if (parser !== undefined) {
      return parser(token.slice(colon + 1));
    }
  }
  if (INTEGER_PATTERN.test(token)) {
    const value = Number(token);
    return capture(Number.isSafeInteger(value) ? value : BigInt(token));
  }
  if (NUMBER_PATTERN.test(token)) {
    return double(Number(token));
  }
  return str(token);
}

/**
 * Parse a comma-separated kind list such as "int,str,double"
 */
export function parseKindList(list: string): ArgumentKind[] {
  return list
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0)
    .map((name) => {
      const kind = KIND_ALIASES[name];
      if (kind === undefined) {
        throw new ArgumentError(`Unknown argument kind: ${name}`, {
          valid: Object.keys(KIND_ALIASES),
        });
      }
      return kind;
    });
}
