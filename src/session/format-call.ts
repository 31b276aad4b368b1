import type { ArgumentStore } from "../args/argument-store.js";
import type { Argument } from "../args/types.js";
import type { GrowableBuffer } from "../buffer/growable-buffer.js";
import { SessionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { TemplateParser } from "../template/parser.js";

/**
 * Runs after a call rendered successfully, with the formatter's output
 */
export type FinalizeAction = (output: Uint8Array) => void;

type CallStatus = "open" | "done" | "failed";

/**
 * One template rendered against the arguments inserted for it.
 *
 * Arguments are accepted while the call is open. `finalize` renders
 * exactly once: later calls return, or rethrow the error of the first
 * attempt. A failed render leaves the buffer as it was before the call.
 */
export class FormatCall {
  private status: CallStatus = "open";
  private failure: unknown = undefined;

  constructor(
    readonly template: string,
    private readonly buffer: GrowableBuffer,
    private readonly args: ArgumentStore,
    private readonly parser: TemplateParser,
    private readonly action?: FinalizeAction
  ) {}

  get isOpen(): boolean {
    return this.status === "open";
  }

  get argumentCount(): number {
    return this.args.size;
  }

  add(arg: Argument): void {
    if (this.status !== "open") {
      throw new SessionError("Cannot insert arguments into a finished format call", {
        template: this.template,
      });
    }
    this.args.push(arg);
  }

  finalize(): void {
    if (this.status === "done") {
      return;
    }
    if (this.status === "failed") {
      throw this.failure;
    }

    const start = this.buffer.size;
    try {
      this.parser.render(this.template, this.args, this.buffer);
    } catch (error) {
      // Drop whatever the failed render appended
      this.buffer.resize(start);
      this.status = "failed";
      this.failure = error;
      throw error;
    }
    this.status = "done";
    logger.debug(`Rendered ${this.args.size} argument(s) into ${this.buffer.size} bytes`);
    this.action?.(this.buffer.data());
  }

  /**
   * Formatter output after this call
   */
  output(): GrowableBuffer {
    this.finalize();
    return this.buffer;
  }
}
