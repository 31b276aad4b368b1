import { SessionError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import type { Argument } from "./types.js";

/**
 * Default number of arguments kept in the preallocated slots
 */
export const INLINE_ARGS = 10;

/**
 * Ordered list of the arguments of one format call.
 *
 * The first `inlineArgs` arguments go into preallocated slots; later ones
 * spill into an overflow array. Lookups are the same either way. The store
 * is frozen before the template is rendered against it.
 */
export class ArgumentStore {
  private readonly slots: (Argument | undefined)[];
  private overflow: Argument[] | null = null;
  private count = 0;
  private frozen = false;

  constructor(private readonly inlineArgs: number = INLINE_ARGS) {
    this.slots = new Array<Argument | undefined>(inlineArgs).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** Whether arguments have spilled past the preallocated slots */
  get spilled(): boolean {
    return this.overflow !== null;
  }

  push(arg: Argument): void {
    if (this.frozen) {
      throw new SessionError("Cannot add arguments after formatting has started", {
        index: this.count,
      });
    }
    if (this.count < this.inlineArgs) {
      this.slots[this.count] = arg;
    } else {
      if (this.overflow === null) {
        logger.debug(`Argument list spilled past ${this.inlineArgs} inline slots`);
        this.overflow = [];
      }
      this.overflow.push(arg);
    }
    this.count++;
  }

  /**
   * Argument at `index`, or undefined when out of range
   */
  get(index: number): Argument | undefined {
    if (index < 0 || index >= this.count) {
      return undefined;
    }
    if (index < this.inlineArgs) {
      return this.slots[index];
    }
    return this.overflow?.[index - this.inlineArgs];
  }

  freeze(): void {
    this.frozen = true;
  }

  /**
   * Drop all arguments and accept new ones
   */
  reset(): void {
    this.slots.fill(undefined);
    this.overflow = null;
    this.count = 0;
    this.frozen = false;
  }

  *[Symbol.iterator](): IterableIterator<Argument> {
    for (let i = 0; i < this.count; i++) {
      const arg = this.get(i);
      if (arg !== undefined) {
        yield arg;
      }
    }
  }
}
