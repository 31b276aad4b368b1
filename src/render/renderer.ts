import type { Argument, StringArgument } from "../args/types.js";
import type { GrowableBuffer } from "../buffer/growable-buffer.js";

import { unknownTypeError } from "./errors.js";
import { formatDouble } from "./float.js";
import { printfConverter } from "./float-converter.js";
import { formatInteger } from "./integer.js";
import type { FloatConverter, FormatSpec } from "./types.js";

const SPACE = 0x20;
const encoder = new TextEncoder();

/**
 * Byte length of a text argument; a zero size means "up to the first zero byte"
 */
export function textLength(arg: StringArgument): number {
  if (arg.size === 0 && arg.value.length > 0 && arg.value[0] !== 0) {
    const end = arg.value.indexOf(0);
    return end === -1 ? arg.value.length : end;
  }
  return arg.size;
}

/**
 * Append `bytes` left-aligned in `width` columns
 */
function appendPadded(buffer: GrowableBuffer, bytes: Uint8Array, width: number): void {
  const start = buffer.extend(Math.max(width, bytes.length));
  buffer.write(bytes, start);
  buffer.fill(SPACE, start + bytes.length, buffer.size);
}

/**
 * Renders arguments into an output buffer according to a checked spec
 */
export class ArgumentRenderer {
  constructor(private readonly converter: FloatConverter = printfConverter) {}

  render(buffer: GrowableBuffer, arg: Argument, spec: FormatSpec): void {
    switch (arg.kind) {
      case "int":
      case "uint":
        formatInteger(buffer, BigInt(arg.value), 32, spec);
        break;
      case "long":
      case "ulong":
        formatInteger(buffer, arg.value, 64, spec);
        break;
      case "double":
      case "longDouble":
        formatDouble(buffer, arg.value, spec, arg.kind === "longDouble", this.converter);
        break;
      case "char":
        if (spec.type !== undefined && spec.type !== "c") {
          throw unknownTypeError(spec.type, arg.kind);
        }
        appendPadded(buffer, Uint8Array.of(arg.value), spec.width);
        break;
      case "string":
        if (spec.type !== undefined && spec.type !== "s") {
          throw unknownTypeError(spec.type, arg.kind);
        }
        appendPadded(buffer, arg.value.subarray(0, textLength(arg)), spec.width);
        break;
      case "pointer":
        if (spec.type !== undefined && spec.type !== "p") {
          throw unknownTypeError(spec.type, arg.kind);
        }
        formatInteger(buffer, arg.value, 64, {
          signPlus: false,
          zeroPad: false,
          hexPrefix: true,
          width: spec.width,
          type: "x",
        });
        break;
      case "custom":
        if (spec.type !== undefined) {
          throw unknownTypeError(spec.type, arg.kind);
        }
        appendPadded(buffer, encoder.encode(arg.render(spec.width)), spec.width);
        break;
    }
  }
}
