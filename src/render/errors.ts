import { kindDisplayName, type ArgumentKind } from "../args/types.js";
import { FormatError } from "../lib/errors.js";

const encoder = new TextEncoder();

function isPrintable(code: number): boolean {
  return code >= 0x20 && code < 0x7f;
}

/**
 * Error for a type character the argument kind does not accept.
 * Other characters are shown as a hex escape of their first UTF-8 byte.
 */
export function unknownTypeError(type: string, kind: ArgumentKind): FormatError {
  const kindName = kindDisplayName(kind);
  const code = type.codePointAt(0) ?? 0;
  const firstByte = encoder.encode(type)[0] ?? 0;
  const shown = isPrintable(code) ? type : `\\x${firstByte.toString(16).padStart(2, "0")}`;
  return new FormatError(`unknown format code '${shown}' for ${kindName}`, {
    type: shown,
    kind: kindName,
  });
}
