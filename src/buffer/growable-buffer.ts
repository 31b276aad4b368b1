import { logger } from "../lib/logger.js";

/**
 * Default number of bytes a buffer holds before it reallocates
 */
export const INLINE_BUFFER_SIZE = 500;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Contiguous, resizable byte storage for formatted output.
 *
 * Bytes in [0, size) are the logical content. Bytes in [size, capacity)
 * are spare storage whose content is unspecified: `resize` exposes them
 * without clearing, so callers write before they read.
 *
 * Views returned by `data()` or `spare()` point into the current backing
 * array and go stale after any call that grows the buffer.
 */
export class GrowableBuffer {
  private bytes: Uint8Array;
  private length = 0;
  private readonly inlineCapacity: number;

  constructor(inlineCapacity: number = INLINE_BUFFER_SIZE) {
    this.inlineCapacity = inlineCapacity;
    this.bytes = new Uint8Array(inlineCapacity);
  }

  /** Number of logical bytes */
  get size(): number {
    return this.length;
  }

  /** Number of bytes that fit without reallocating */
  get capacity(): number {
    return this.bytes.length;
  }

  /** Whether the buffer has outgrown its initial storage */
  get spilled(): boolean {
    return this.bytes.length > this.inlineCapacity;
  }

  /**
   * Ensure capacity is at least `capacity`
   */
  reserve(capacity: number): void {
    if (capacity > this.bytes.length) {
      this.grow(capacity);
    }
  }

  /**
   * Set the logical size, growing storage when needed.
   * Shrinking keeps the bytes in place but drops them from the content.
   */
  resize(size: number): void {
    if (size > this.bytes.length) {
      this.grow(size);
    }
    this.length = size;
  }

  /**
   * Extend the logical size by `n` bytes and return the offset of the new span
   */
  extend(n: number): number {
    const offset = this.length;
    this.resize(offset + n);
    return offset;
  }

  /**
   * Append raw bytes
   */
  append(data: Uint8Array): void {
    const offset = this.extend(data.length);
    this.bytes.set(data, offset);
  }

  /**
   * Append a UTF-8 encoded string
   */
  appendText(text: string): void {
    this.append(encoder.encode(text));
  }

  /**
   * Fill [start, end) with a single byte
   */
  fill(byte: number, start: number, end: number): void {
    this.bytes.fill(byte, start, end);
  }

  set(index: number, byte: number): void {
    this.bytes[index] = byte;
  }

  at(index: number): number {
    return this.bytes[index] ?? 0;
  }

  /**
   * Copy `data` into storage at `offset` without touching the logical size
   */
  write(data: Uint8Array, offset: number): void {
    this.bytes.set(data, offset);
  }

  clear(): void {
    this.length = 0;
  }

  /**
   * View of the logical content
   */
  data(): Uint8Array {
    return this.bytes.subarray(0, this.length);
  }

  /**
   * View of the storage past the logical content
   */
  spare(): Uint8Array {
    return this.bytes.subarray(this.length);
  }

  /**
   * View of the logical content followed by a zero byte.
   * The terminator lives in spare storage and is not counted in `size`.
   */
  terminated(): Uint8Array {
    this.reserve(this.length + 1);
    this.bytes[this.length] = 0;
    return this.bytes.subarray(0, this.length + 1);
  }

  toString(): string {
    return decoder.decode(this.data());
  }

  private grow(size: number): void {
    const capacity = Math.max(size, this.bytes.length + Math.floor(this.bytes.length / 2));
    const next = new Uint8Array(capacity);
    next.set(this.bytes.subarray(0, this.length));
    logger.debug(`Output buffer grown from ${this.bytes.length} to ${capacity} bytes`);
    this.bytes = next;
  }
}
