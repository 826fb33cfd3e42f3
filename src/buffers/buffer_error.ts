/**
 * Shared error types for the code unit buffers.
 *
 * Byte and char buffers raise the same error shapes so that codec loops and
 * the conformance harness can treat them uniformly.
 */

/** Error thrown when a relative read finds no remaining units. */
export class BufferUnderflowError extends RangeError {
  /** The position where the read was attempted. */
  public readonly position: number;
  /** The limit of the buffer at the time of the read. */
  public readonly limit: number;

  constructor(message: string, position: number, limit: number) {
    super(message);
    this.name = "BufferUnderflowError";
    this.position = position;
    this.limit = limit;
  }
}

/** Error thrown when a relative write finds no room before the limit. */
export class BufferOverflowError extends RangeError {
  /** The position where the write was attempted. */
  public readonly position: number;
  /** The limit of the buffer at the time of the write. */
  public readonly limit: number;

  constructor(message: string, position: number, limit: number) {
    super(message);
    this.name = "BufferOverflowError";
    this.position = position;
    this.limit = limit;
  }
}

/** Error thrown when content or the backing array of a read-only view is touched. */
export class ReadOnlyBufferError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation} a read-only buffer.`);
    this.name = "ReadOnlyBufferError";
  }
}

/** Error thrown when a buffer is reset to a mark that was never set or was discarded. */
export class InvalidMarkError extends RangeError {
  constructor() {
    super("Buffer mark is not set.");
    this.name = "InvalidMarkError";
  }
}
