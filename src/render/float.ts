import type { GrowableBuffer } from "../buffer/growable-buffer.js";
import { FormatError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import { unknownTypeError } from "./errors.js";
import { describeDirective } from "./float-converter.js";
import { isFloatType, type ConversionDirective, type FloatConverter, type FormatSpec } from "./types.js";

/**
 * Append a floating-point value through `converter`.
 *
 * The converter writes straight into the buffer's spare storage. When the
 * text does not fit, the buffer grows to exactly the reported length and
 * the conversion runs once more.
 */
export function formatDouble(
  buffer: GrowableBuffer,
  value: number,
  spec: FormatSpec,
  extended: boolean,
  converter: FloatConverter
): void {
  const type = spec.type ?? "g";
  if (!isFloatType(type)) {
    throw unknownTypeError(type, extended ? "longDouble" : "double");
  }

  const directive: ConversionDirective = {
    signPlus: spec.signPlus,
    zeroPad: spec.zeroPad,
    width: spec.width,
    precision: spec.precision,
    type,
    extended,
  };

  const offset = buffer.size;
  let needed = converter.convert(value, directive, buffer.spare());
  if (needed > buffer.capacity - offset) {
    logger.debug(`Conversion ${describeDirective(directive)} needs ${needed} bytes, growing buffer`);
    buffer.reserve(offset + needed);
    needed = converter.convert(value, directive, buffer.spare());
    if (needed > buffer.capacity - offset) {
      throw new FormatError("floating-point conversion does not fit the output buffer", {
        needed,
        directive: describeDirective(directive),
      });
    }
  }
  buffer.resize(offset + needed);
}
