import { CodeUnitBuffer } from "./code_unit_buffer.ts";

// String.fromCharCode argument count stays well below engine limits.
const RENDER_CHUNK = 8192;

/**
 * Char buffer over UTF-16 code units. Surrogate pairs occupy two positions,
 * exactly as they do in a JavaScript string.
 */
export class CharBuffer extends CodeUnitBuffer<Uint16Array> {
  private constructor(
    store: Uint16Array,
    offset: number,
    capacity: number,
    readOnly: boolean,
  ) {
    super(store, offset, capacity, readOnly);
  }

  public static allocate(capacity: number): CharBuffer {
    return new CharBuffer(new Uint16Array(capacity), 0, capacity, false);
  }

  /** Copies the code units of `text` into a new writable buffer. */
  public static wrap(text: string): CharBuffer {
    const store = new Uint16Array(text.length);
    for (let index = 0; index < text.length; index++) {
      store[index] = text.charCodeAt(index);
    }
    return new CharBuffer(store, 0, store.length, false);
  }

  /** Wraps an existing code unit array without copying. */
  public static wrapUnits(units: Uint16Array): CharBuffer {
    return new CharBuffer(units, 0, units.length, false);
  }

  /** Reads the next code unit. */
  public get(): number {
    return this.store[this.nextGetIndex()];
  }

  public getAt(index: number): number {
    return this.store[this.checkedIndex(index)];
  }

  public put(unit: number): this {
    this.store[this.nextPutIndex()] = unit;
    return this;
  }

  /** Writes every code unit of `text`; nothing is written when it does not fit. */
  public putString(text: string): this {
    const start = this.takeForPut(text.length);
    for (let index = 0; index < text.length; index++) {
      this.store[start + index] = text.charCodeAt(index);
    }
    return this;
  }

  /** Relative bulk write of the remaining units of another buffer. */
  public putAll(source: CharBuffer): this {
    const count = source.remaining();
    const start = this.takeForPut(count);
    for (let index = 0; index < count; index++) {
      this.store[start + index] = source.get();
    }
    return this;
  }

  public duplicate(): CharBuffer {
    return this.withCursorOf(
      new CharBuffer(
        this.store,
        this.windowOffset(),
        this.capacity(),
        this.isReadOnly(),
      ),
    );
  }

  public asReadOnlyBuffer(): CharBuffer {
    return this.withCursorOf(
      new CharBuffer(this.store, this.windowOffset(), this.capacity(), true),
    );
  }

  public slice(): CharBuffer {
    return new CharBuffer(
      this.store,
      this.windowOffset() + this.position(),
      this.remaining(),
      this.isReadOnly(),
    );
  }

  /** Renders the remaining code units without moving the cursor. */
  public toString(): string {
    const start = this.windowOffset() + this.position();
    const end = start + this.remaining();
    let text = "";
    for (let index = start; index < end; index += RENDER_CHUNK) {
      text += String.fromCharCode(
        ...this.store.subarray(index, Math.min(end, index + RENDER_CHUNK)),
      );
    }
    return text;
  }
}
