import { ArgumentStore } from "../args/argument-store.js";
import { GrowableBuffer } from "../buffer/growable-buffer.js";
import { resolveOptions, type FormatterOptions } from "../config/options.js";
import { SessionError } from "../lib/errors.js";
import { ArgumentRenderer } from "../render/renderer.js";
import { TemplateParser } from "../template/parser.js";

import { FormatCall, type FinalizeAction } from "./format-call.js";
import { FormatSession } from "./session.js";

/**
 * Output buffer shared by successive format calls.
 *
 * Each call appends to what earlier calls produced, until `clear()`.
 *
 * @example
 * ```typescript
 * const out = new Formatter();
 * out.format("Current point:\n").finish();
 * out.format("({0:+f}, {1:+f})").insert(-3.5).insert(3.5).finish();
 * out.text(); // "Current point:\n(-3.500000, +3.500000)"
 * ```
 */
export class Formatter {
  private readonly buffer: GrowableBuffer;
  private readonly args: ArgumentStore;
  private readonly parser: TemplateParser;
  private current: FormatCall | null = null;

  /**
   * @throws ConfigError when an option is invalid
   */
  constructor(options: FormatterOptions = {}) {
    const resolved = resolveOptions(options);
    this.buffer = new GrowableBuffer(resolved.inlineCapacity);
    this.args = new ArgumentStore(resolved.inlineArgs);
    this.parser = new TemplateParser(new ArgumentRenderer(resolved.converter));
  }

  /**
   * Start a format call whose output is appended to this formatter.
   * `action` runs once with the whole output after a successful render.
   */
  format(template: string, action?: FinalizeAction): FormatSession {
    this.ensureIdle();
    this.args.reset();
    this.current = new FormatCall(template, this.buffer, this.args, this.parser, action);
    return new FormatSession(this.current);
  }

  get size(): number {
    return this.buffer.size;
  }

  /** Output accumulated so far */
  data(): Uint8Array {
    return this.buffer.data();
  }

  /** Output followed by a zero terminator */
  view(): Uint8Array {
    return this.buffer.terminated();
  }

  text(): string {
    return this.buffer.toString();
  }

  clear(): void {
    this.ensureIdle();
    this.buffer.clear();
  }

  private ensureIdle(): void {
    if (this.current?.isOpen) {
      throw new SessionError("The previous format call has not been finished", {
        template: this.current.template,
      });
    }
  }
}
