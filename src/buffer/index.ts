export { GrowableBuffer, INLINE_BUFFER_SIZE } from "./growable-buffer.js";
