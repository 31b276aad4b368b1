/**
 * Format sessions
 *
 * - begin/print/format/tryFormat - entry points
 * - Formatter    - output buffer shared by successive calls
 * - FormatSession - argument insertion and finalization
 * - checkTemplate - validation against argument kinds
 */

export { begin, print, format, tryFormat, type OutputStream, type PrintOptions } from "./entry.js";
export { Formatter } from "./formatter.js";
export { FormatSession } from "./session.js";
export { FormatCall, type FinalizeAction } from "./format-call.js";
export { checkTemplate } from "./check.js";
