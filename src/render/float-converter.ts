import type { ConversionDirective, FloatConverter } from "./types.js";

const DEFAULT_PRECISION = 6;

/**
 * Exact decimal value of a finite double: `digits / 10^scale`
 */
interface Decimal {
  digits: bigint;
  scale: number;
}

function toDecimal(abs: number): Decimal {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, abs);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  let mantissa = bits & 0xfffffffffffffn;
  let exponent = -1074;
  if (biased !== 0) {
    mantissa |= 1n << 52n;
    exponent = biased - 1075;
  }
  if (exponent >= 0) {
    return { digits: mantissa << BigInt(exponent), scale: 0 };
  }
  // m / 2^k == m * 5^k / 10^k
  return { digits: mantissa * 5n ** BigInt(-exponent), scale: -exponent };
}

/**
 * `value * 10^places` rounded to an integer, ties to even
 */
function roundToPlaces(value: Decimal, places: number): bigint {
  const drop = value.scale - places;
  if (drop <= 0) {
    return value.digits * 10n ** BigInt(-drop);
  }
  const divisor = 10n ** BigInt(drop);
  const quotient = value.digits / divisor;
  const twice = (value.digits % divisor) * 2n;
  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * Round to `count` significant digits. Returns the digits and the
 * decimal exponent of the first one.
 */
function roundSignificant(value: Decimal, count: number): { mantissa: bigint; exponent: number } {
  if (value.digits === 0n) {
    return { mantissa: 0n, exponent: 0 };
  }
  let exponent = value.digits.toString().length - 1 - value.scale;
  let mantissa = roundToPlaces(value, count - 1 - exponent);
  if (mantissa.toString().length > count) {
    // 9.99 -> 10.0
    mantissa /= 10n;
    exponent += 1;
  }
  return { mantissa, exponent };
}

function fixed(value: Decimal, precision: number): string {
  const digits = roundToPlaces(value, precision).toString().padStart(precision + 1, "0");
  if (precision === 0) {
    return digits;
  }
  return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`;
}

function exponential(value: Decimal, precision: number): string {
  const { mantissa, exponent } = roundSignificant(value, precision + 1);
  const digits = mantissa.toString().padStart(precision + 1, "0");
  const fraction = precision > 0 ? `.${digits.slice(1)}` : "";
  const expSign = exponent < 0 ? "-" : "+";
  return `${digits.slice(0, 1)}${fraction}e${expSign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function stripTrailingZeros(text: string): string {
  const [mantissa = "", exponent] = text.split("e");
  const stripped = mantissa.includes(".") ? mantissa.replace(/0+$/, "").replace(/\.$/, "") : mantissa;
  return exponent === undefined ? stripped : `${stripped}e${exponent}`;
}

function general(value: Decimal, precision: number): string {
  const significant = precision === 0 ? 1 : precision;
  const { exponent } = roundSignificant(value, significant);
  const text =
    exponent < significant && exponent >= -4
      ? fixed(value, significant - 1 - exponent)
      : exponential(value, significant - 1);
  return stripTrailingZeros(text);
}

function digitsFor(abs: number, directive: ConversionDirective): string {
  const precision = directive.precision ?? DEFAULT_PRECISION;
  const value = toDecimal(abs);
  switch (directive.type) {
    case "f":
    case "F":
      return fixed(value, precision);
    case "e":
    case "E":
      return exponential(value, precision);
    case "g":
    case "G":
      return general(value, precision);
  }
}

/**
 * Render a value the way C's printf renders `%[+][0][width][.precision]type`
 */
export function convertToText(value: number, directive: ConversionDirective): string {
  const negative = value < 0 || Object.is(value, -0);
  const sign = negative ? "-" : directive.signPlus ? "+" : "";
  const abs = Math.abs(value);
  const finite = Number.isFinite(abs);

  let digits: string;
  if (Number.isNaN(abs)) {
    digits = "nan";
  } else if (!finite) {
    digits = "inf";
  } else {
    digits = digitsFor(abs, directive);
  }
  if (directive.type === "E" || directive.type === "F" || directive.type === "G") {
    digits = digits.toUpperCase();
  }

  const padding = directive.width - sign.length - digits.length;
  if (padding <= 0) {
    return sign + digits;
  }
  if (directive.zeroPad && finite) {
    return sign + "0".repeat(padding) + digits;
  }
  return " ".repeat(padding) + sign + digits;
}

/**
 * printf-style rendering of a directive, e.g. `%+0*.*Lg`
 */
export function describeDirective(directive: ConversionDirective): string {
  return [
    "%",
    directive.signPlus ? "+" : "",
    directive.zeroPad ? "0" : "",
    directive.width > 0 ? "*" : "",
    directive.precision !== undefined ? ".*" : "",
    directive.extended ? "L" : "",
    directive.type,
  ].join("");
}

/**
 * Built-in converter. JavaScript numbers are all doubles, so extended
 * precision arguments convert the same way as plain ones.
 */
export const printfConverter: FloatConverter = {
  convert(value, directive, out) {
    const text = convertToText(value, directive);
    const count = Math.min(text.length, out.length);
    for (let i = 0; i < count; i++) {
      out[i] = text.charCodeAt(i);
    }
    return text.length;
  },
};
