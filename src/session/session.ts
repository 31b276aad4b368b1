import { capture } from "../args/capture.js";
import type { Capturable } from "../args/types.js";
import { SessionError } from "../lib/errors.js";

import type { FormatCall } from "./format-call.js";

/**
 * Handle through which arguments are inserted into a format call.
 *
 * Insert arguments in placeholder order, then call `text()`, `view()`
 * or `finish()`. Rendering happens on the first of these calls and never
 * again, so every value passed to `insert` must stay unchanged until then.
 *
 * A handle can pass the call on with `transfer()`. The old handle is
 * disarmed and only the new owner can insert or finalize.
 *
 * @example
 * ```typescript
 * const text = begin("{0} has {1:#x} flags").insert("file").insert(uint(255)).text();
 * // "file has 0xff flags"
 * ```
 */
export class FormatSession {
  private call: FormatCall | null;

  constructor(call: FormatCall) {
    this.call = call;
  }

  /** Number of arguments inserted so far */
  get argumentCount(): number {
    return this.owned().argumentCount;
  }

  /** Whether the call has been rendered (or failed to render) */
  get finished(): boolean {
    return !this.owned().isOpen;
  }

  /** Whether this handle gave up its call through `transfer()` */
  get transferred(): boolean {
    return this.call === null;
  }

  /**
   * Append one argument. Bare numbers are classified by value (`2` is an
   * int, `2.5` a double); use `double()` for values rendered with a
   * precision or a floating-point type.
   *
   * @throws ArgumentError when the value cannot be captured
   */
  insert(value: Capturable): this {
    this.owned().add(capture(value));
    return this;
  }

  /**
   * Append several arguments in order
   */
  insertAll(values: Iterable<Capturable>): this {
    const call = this.owned();
    for (const value of values) {
      call.add(capture(value));
    }
    return this;
  }

  /**
   * Move the call to a new handle and disarm this one
   */
  transfer(): FormatSession {
    const call = this.owned();
    this.call = null;
    return new FormatSession(call);
  }

  /**
   * Render the template if that has not happened yet
   *
   * @throws FormatError when the template does not match the arguments
   */
  finish(): void {
    this.owned().finalize();
  }

  /**
   * Rendered output as a string
   */
  text(): string {
    return this.owned().output().toString();
  }

  /**
   * Rendered output as bytes followed by a zero terminator that is not
   * part of the text. The view is only valid until the formatter is used
   * again.
   */
  view(): Uint8Array {
    return this.owned().output().terminated();
  }

  private owned(): FormatCall {
    if (this.call === null) {
      throw new SessionError("Format session was transferred to another owner");
    }
    return this.call;
  }
}
