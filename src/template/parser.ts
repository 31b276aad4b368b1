import type { ArgumentStore } from "../args/argument-store.js";
import { isFloatKind, isIntegerKind, isNumericKind, isSignedKind, type Argument } from "../args/types.js";
import type { GrowableBuffer } from "../buffer/growable-buffer.js";
import { FormatError } from "../lib/errors.js";
import { ArgumentRenderer } from "../render/renderer.js";
import { EMPTY_SPEC, type FormatSpec } from "../render/types.js";

/**
 * Largest index, width or precision a template may contain
 */
export const MAX_FORMAT_NUMBER = 0x7fffffff;

const encoder = new TextEncoder();

function isDigit(c: string | undefined): c is string {
  return c !== undefined && c >= "0" && c <= "9";
}

/**
 * Scan position in a template. Only moves forward.
 */
export class ParseCursor {
  pos: number;

  constructor(
    readonly text: string,
    pos = 0
  ) {
    this.pos = pos;
  }

  peek(): string | undefined {
    return this.text[this.pos];
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }
}

/**
 * Throw the error found at the cursor.
 *
 * Scans ahead for the `}` closing the open placeholder. When there is one,
 * `message` is reported; when the template ends first, the unmatched `{`
 * wins. Only runs on the error path.
 */
export function reportError(cursor: ParseCursor, message: string): never {
  const { text } = cursor;
  let openBraces = 1;
  for (let i = cursor.pos; i < text.length; i++) {
    const c = text[i];
    if (c === "{") {
      openBraces++;
    } else if (c === "}" && --openBraces === 0) {
      throw new FormatError(message, { position: cursor.pos });
    }
  }
  throw new FormatError("unmatched '{' in format", { position: cursor.pos });
}

/**
 * Parse an unsigned decimal at the cursor, which must be on a digit
 */
export function parseUInt(cursor: ParseCursor): number {
  let value = 0;
  do {
    value = value * 10 + (cursor.text.charCodeAt(cursor.pos++) - 0x30);
    if (value > MAX_FORMAT_NUMBER) {
      reportError(cursor, "number is too big in format");
    }
  } while (isDigit(cursor.peek()));
  return value;
}

/**
 * Parse `[+][#][0][width][.precision][type]` and check each part against
 * the kind of `arg`
 */
function parseSpec(cursor: ParseCursor, arg: Argument): FormatSpec {
  const spec: FormatSpec = { ...EMPTY_SPEC };

  if (cursor.peek() === "+") {
    cursor.pos++;
    if (!isNumericKind(arg.kind)) {
      reportError(cursor, "format specifier '+' requires numeric argument");
    }
    if (!isSignedKind(arg.kind)) {
      reportError(cursor, "format specifier '+' requires signed argument");
    }
    spec.signPlus = true;
  }

  if (cursor.peek() === "#") {
    cursor.pos++;
    if (!isIntegerKind(arg.kind)) {
      reportError(cursor, "format specifier '#' requires integer argument");
    }
    spec.hexPrefix = true;
  }

  if (cursor.peek() === "0") {
    cursor.pos++;
    if (!isNumericKind(arg.kind)) {
      reportError(cursor, "format specifier '0' requires numeric argument");
    }
    spec.zeroPad = true;
  }

  if (isDigit(cursor.peek())) {
    spec.width = parseUInt(cursor);
  }

  if (cursor.peek() === ".") {
    cursor.pos++;
    if (!isDigit(cursor.peek())) {
      reportError(cursor, "missing precision in format");
    }
    spec.precision = parseUInt(cursor);
    if (!isFloatKind(arg.kind)) {
      reportError(cursor, "precision specifier requires floating-point argument");
    }
  }

  const next = cursor.peek();
  if (next !== undefined && next !== "}") {
    const codePoint = cursor.text.codePointAt(cursor.pos) ?? 0;
    spec.type = String.fromCodePoint(codePoint);
    cursor.pos += spec.type.length;
  }

  return spec;
}

/**
 * Renders a template against captured arguments.
 *
 * Literal text is copied as UTF-8. `{{` and `}}` produce single braces,
 * any other `}` outside a placeholder is an error, and
 * `{index[:spec]}` renders the argument at `index`. The first error aborts
 * the call; output written before it is not meaningful.
 *
 * @example
 * ```typescript
 * const parser = new TemplateParser();
 * parser.render("{0:+05d}", args, buffer); // "-0003" for -3
 * ```
 */
export class TemplateParser {
  constructor(private readonly renderer: ArgumentRenderer = new ArgumentRenderer()) {}

  render(template: string, args: ArgumentStore, buffer: GrowableBuffer): void {
    args.freeze();
    const cursor = new ParseCursor(template);
    let start = 0;

    while (!cursor.atEnd()) {
      const c = template[cursor.pos++];
      if (c !== "{" && c !== "}") {
        continue;
      }
      if (cursor.peek() === c) {
        // Keep one brace of the pair
        buffer.appendText(template.slice(start, cursor.pos));
        start = ++cursor.pos;
        continue;
      }
      if (c === "}") {
        throw new FormatError("unmatched '}' in format", { position: cursor.pos - 1 });
      }
      buffer.appendText(template.slice(start, cursor.pos - 1));

      if (!isDigit(cursor.peek())) {
        reportError(cursor, "missing argument index in format string");
      }
      const index = parseUInt(cursor);
      const arg = args.get(index);
      if (arg === undefined) {
        reportError(cursor, "argument index is out of range in format");
      }

      let spec: FormatSpec = EMPTY_SPEC;
      if (cursor.peek() === ":") {
        cursor.pos++;
        spec = parseSpec(cursor, arg);
      }

      if (template[cursor.pos++] !== "}") {
        throw new FormatError("unmatched '{' in format", { position: cursor.pos - 1 });
      }
      start = cursor.pos;

      this.renderer.render(buffer, arg, spec);
    }

    // Trailing literal plus a terminator that stays in storage
    buffer.append(encoder.encode(template.slice(start) + "\0"));
    buffer.resize(buffer.size - 1);
  }
}
