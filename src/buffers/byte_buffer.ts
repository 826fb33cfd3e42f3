import { CodeUnitBuffer } from "./code_unit_buffer.ts";

/**
 * Byte buffer with a position/limit cursor over a `Uint8Array`.
 *
 * @example
 * ```typescript
 * const buffer = ByteBuffer.wrap(new Uint8Array([0x41, 0x42]));
 * buffer.get(); // 0x41
 * buffer.remaining(); // 1
 *
 * const view = buffer.asReadOnlyBuffer();
 * view.put(0x43); // ReadOnlyBufferError
 * ```
 */
export class ByteBuffer extends CodeUnitBuffer<Uint8Array> {
  private constructor(
    store: Uint8Array,
    offset: number,
    capacity: number,
    readOnly: boolean,
  ) {
    super(store, offset, capacity, readOnly);
  }

  /** Creates a zero-filled writable buffer. */
  public static allocate(capacity: number): ByteBuffer {
    return new ByteBuffer(new Uint8Array(capacity), 0, capacity, false);
  }

  /**
   * Wraps an existing array without copying. With an offset and length the
   * position and limit select that range while the capacity stays the whole
   * array.
   */
  public static wrap(
    array: Uint8Array,
    offset = 0,
    length = array.length - offset,
  ): ByteBuffer {
    const buffer = new ByteBuffer(array, 0, array.length, false);
    buffer.setLimit(offset + length);
    buffer.setPosition(offset);
    return buffer;
  }

  public get(): number {
    return this.store[this.nextGetIndex()];
  }

  public getAt(index: number): number {
    return this.store[this.checkedIndex(index)];
  }

  /** Relative bulk read of `length` bytes into a fresh array. */
  public getBytes(length: number): Uint8Array {
    const start = this.takeForGet(length);
    return this.store.slice(start, start + length);
  }

  public put(value: number): this {
    this.store[this.nextPutIndex()] = value;
    return this;
  }

  public putAt(index: number, value: number): this {
    this.checkWritable("write to");
    this.store[this.checkedIndex(index)] = value;
    return this;
  }

  /** Relative bulk write of an array or of the remaining bytes of a buffer. */
  public putAll(source: Uint8Array | ByteBuffer): this {
    const bytes = source instanceof ByteBuffer
      ? source.getBytes(source.remaining())
      : source;
    const start = this.takeForPut(bytes.length);
    this.store.set(bytes, start);
    return this;
  }

  public duplicate(): ByteBuffer {
    return this.withCursorOf(
      new ByteBuffer(
        this.store,
        this.windowOffset(),
        this.capacity(),
        this.isReadOnly(),
      ),
    );
  }

  public asReadOnlyBuffer(): ByteBuffer {
    return this.withCursorOf(
      new ByteBuffer(this.store, this.windowOffset(), this.capacity(), true),
    );
  }

  /** A view of the remaining bytes, starting at position zero. */
  public slice(): ByteBuffer {
    return new ByteBuffer(
      this.store,
      this.windowOffset() + this.position(),
      this.remaining(),
      this.isReadOnly(),
    );
  }

  /** Copies the remaining bytes without moving the cursor. */
  public toUint8Array(): Uint8Array {
    const start = this.windowOffset() + this.position();
    return this.store.slice(start, start + this.remaining());
  }
}
