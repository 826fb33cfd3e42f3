import {
  BufferOverflowError,
  BufferUnderflowError,
  InvalidMarkError,
  ReadOnlyBufferError,
} from "./buffer_error.ts";

/** Backing store types a code unit buffer can view. */
export type CodeUnitArray = Uint8Array | Uint16Array;

/**
 * Cursor model shared by {@link ByteBuffer} and {@link CharBuffer}.
 *
 * A buffer is a window over a backing array with the usual
 * `0 <= mark <= position <= limit <= capacity` invariant. Views created by
 * `duplicate()` or `asReadOnlyBuffer()` share content with the original but
 * keep an independent cursor.
 */
export abstract class CodeUnitBuffer<TArray extends CodeUnitArray> {
  /** The backing array shared by every view of the same content. */
  protected readonly store: TArray;
  readonly #offset: number;
  readonly #capacity: number;
  readonly #readOnly: boolean;
  #position = 0;
  #limit: number;
  #mark = -1;

  protected constructor(
    store: TArray,
    offset: number,
    capacity: number,
    readOnly: boolean,
  ) {
    if (
      !Number.isInteger(offset) || !Number.isInteger(capacity) ||
      offset < 0 || capacity < 0 || offset + capacity > store.length
    ) {
      throw new RangeError(
        `Invalid buffer window offset=${offset} capacity=${capacity} for storeLength=${store.length}`,
      );
    }
    this.store = store;
    this.#offset = offset;
    this.#capacity = capacity;
    this.#readOnly = readOnly;
    this.#limit = capacity;
  }

  public capacity(): number {
    return this.#capacity;
  }

  public position(): number {
    return this.#position;
  }

  /**
   * Moves the cursor. A mark beyond the new position is discarded.
   */
  public setPosition(newPosition: number): this {
    if (
      !Number.isInteger(newPosition) || newPosition < 0 ||
      newPosition > this.#limit
    ) {
      throw new RangeError(
        `Position must be within [0, ${this.#limit}]. Got position=${newPosition}`,
      );
    }
    if (this.#mark > newPosition) {
      this.#mark = -1;
    }
    this.#position = newPosition;
    return this;
  }

  public limit(): number {
    return this.#limit;
  }

  /**
   * Moves the limit, pulling the position (and discarding the mark) when they
   * would lie beyond it.
   */
  public setLimit(newLimit: number): this {
    if (
      !Number.isInteger(newLimit) || newLimit < 0 ||
      newLimit > this.#capacity
    ) {
      throw new RangeError(
        `Limit must be within [0, ${this.#capacity}]. Got limit=${newLimit}`,
      );
    }
    this.#limit = newLimit;
    if (this.#position > newLimit) {
      this.#position = newLimit;
    }
    if (this.#mark > newLimit) {
      this.#mark = -1;
    }
    return this;
  }

  public mark(): this {
    this.#mark = this.#position;
    return this;
  }

  public reset(): this {
    if (this.#mark < 0) {
      throw new InvalidMarkError();
    }
    this.#position = this.#mark;
    return this;
  }

  public clear(): this {
    this.#position = 0;
    this.#limit = this.#capacity;
    this.#mark = -1;
    return this;
  }

  public flip(): this {
    this.#limit = this.#position;
    this.#position = 0;
    this.#mark = -1;
    return this;
  }

  public rewind(): this {
    this.#position = 0;
    this.#mark = -1;
    return this;
  }

  public remaining(): number {
    return this.#limit - this.#position;
  }

  public hasRemaining(): boolean {
    return this.#position < this.#limit;
  }

  public isReadOnly(): boolean {
    return this.#readOnly;
  }

  /**
   * Whether the backing array is accessible. Read-only views never expose it.
   */
  public hasArray(): boolean {
    return !this.#readOnly;
  }

  public array(): TArray {
    this.checkWritable("access the backing array of");
    return this.store;
  }

  /** Index in the backing array of this buffer's element zero. */
  public arrayOffset(): number {
    this.checkWritable("access the backing array of");
    return this.#offset;
  }

  /**
   * Moves the remaining units to the start of the buffer, leaving it ready
   * for further writes.
   */
  public compact(): this {
    this.checkWritable("compact");
    const start = this.#offset + this.#position;
    const end = this.#offset + this.#limit;
    this.store.copyWithin(this.#offset, start, end);
    this.#position = this.#limit - this.#position;
    this.#limit = this.#capacity;
    this.#mark = -1;
    return this;
  }

  /** Absolute backing-array index of the next relative read; advances. */
  protected nextGetIndex(): number {
    if (this.#position >= this.#limit) {
      throw new BufferUnderflowError(
        `No units remaining. position=${this.#position}, limit=${this.#limit}`,
        this.#position,
        this.#limit,
      );
    }
    return this.#offset + this.#position++;
  }

  /** Absolute backing-array index of the next relative write; advances. */
  protected nextPutIndex(): number {
    this.checkWritable("write to");
    if (this.#position >= this.#limit) {
      throw new BufferOverflowError(
        `No room remaining. position=${this.#position}, limit=${this.#limit}`,
        this.#position,
        this.#limit,
      );
    }
    return this.#offset + this.#position++;
  }

  /** Absolute backing-array index for a buffer index below the limit. */
  protected checkedIndex(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.#limit) {
      throw new RangeError(
        `Index must be within [0, ${this.#limit}). Got index=${index}`,
      );
    }
    return this.#offset + index;
  }

  /**
   * Reserves `count` units for a bulk read and returns the absolute start
   * index; the position advances past them.
   */
  protected takeForGet(count: number): number {
    if (count > this.remaining()) {
      throw new BufferUnderflowError(
        `Bulk read of ${count} units exceeds remaining=${this.remaining()}`,
        this.#position,
        this.#limit,
      );
    }
    const start = this.#offset + this.#position;
    this.#position += count;
    return start;
  }

  /**
   * Reserves `count` units for a bulk write and returns the absolute start
   * index; the position advances past them.
   */
  protected takeForPut(count: number): number {
    this.checkWritable("write to");
    if (count > this.remaining()) {
      throw new BufferOverflowError(
        `Bulk write of ${count} units exceeds remaining=${this.remaining()}`,
        this.#position,
        this.#limit,
      );
    }
    const start = this.#offset + this.#position;
    this.#position += count;
    return start;
  }

  protected checkWritable(operation: string): void {
    if (this.#readOnly) {
      throw new ReadOnlyBufferError(operation);
    }
  }

  /** Window start of this buffer inside the backing array. */
  protected windowOffset(): number {
    return this.#offset;
  }

  /** Copies position, limit and mark onto a view of the same content. */
  protected withCursorOf<TView extends CodeUnitBuffer<TArray>>(
    view: TView,
  ): TView {
    view.#limit = this.#limit;
    view.#position = this.#position;
    view.#mark = this.#mark;
    return view;
  }
}
