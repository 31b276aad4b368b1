import type { GrowableBuffer } from "../buffer/growable-buffer.js";

import { unknownTypeError } from "./errors.js";
import type { FormatSpec } from "./types.js";

const LOWER_DIGITS = "0123456789abcdef";
const UPPER_DIGITS = "0123456789ABCDEF";

const ZERO = 0x30;
const SPACE = 0x20;

export type IntegerSpec = Pick<FormatSpec, "signPlus" | "zeroPad" | "hexPrefix" | "width" | "type">;

function countDigits(n: bigint, base: bigint): number {
  let count = 0;
  do {
    count++;
    n /= base;
  } while (n !== 0n);
  return count;
}

/**
 * Append an integer.
 *
 * Decimal output carries a sign; hex and octal output show the value's
 * two's-complement bit pattern at its own width (`bits`) without one.
 * The result is right-aligned in `width` columns. With zero padding the
 * sign or 0x prefix takes the first columns and zeros follow it.
 */
export function formatInteger(
  buffer: GrowableBuffer,
  value: bigint,
  bits: 32 | 64,
  spec: IntegerSpec
): void {
  const type = spec.type ?? "d";
  let base: bigint;
  let digits = LOWER_DIGITS;
  let lead = "";
  let magnitude: bigint;

  switch (type) {
    case "d":
      base = 10n;
      if (value < 0n) {
        lead = "-";
        magnitude = -value;
      } else {
        lead = spec.signPlus ? "+" : "";
        magnitude = value;
      }
      break;
    case "x":
    case "X":
      base = 16n;
      digits = type === "x" ? LOWER_DIGITS : UPPER_DIGITS;
      lead = spec.hexPrefix ? `0${type}` : "";
      magnitude = BigInt.asUintN(bits, value);
      break;
    case "o":
      base = 8n;
      magnitude = BigInt.asUintN(bits, value);
      break;
    default:
      throw unknownTypeError(type, bits === 32 ? "int" : "long");
  }

  const size = lead.length + countDigits(magnitude, base);
  const width = Math.max(spec.width, size);
  const start = buffer.extend(width);

  let p = start + width - 1;
  let n = magnitude;
  do {
    buffer.set(p--, digits.charCodeAt(Number(n % base)));
    n /= base;
  } while (n !== 0n);

  if (spec.zeroPad) {
    for (let i = 0; i < lead.length; i++) {
      buffer.set(start + i, lead.charCodeAt(i));
    }
    buffer.fill(ZERO, start + lead.length, p + 1);
  } else {
    for (let i = lead.length - 1; i >= 0; i--) {
      buffer.set(p--, lead.charCodeAt(i));
    }
    buffer.fill(SPACE, start, p + 1);
  }
}
