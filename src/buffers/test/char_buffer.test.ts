import { describe, expect, it } from "vitest";
import { CharBuffer } from "../char_buffer.ts";
import { BufferOverflowError, ReadOnlyBufferError } from "../buffer_error.ts";

describe("CharBuffer", () => {
  it("renders the remaining code units", () => {
    const buffer = CharBuffer.wrap("héllo");

    expect(buffer.get()).toBe(0x68);
    expect(buffer.toString()).toBe("éllo");
    expect(buffer.position()).toBe(1);
  });

  it("stores surrogate pairs as two units", () => {
    const buffer = CharBuffer.wrap("\u{1F600}");

    expect(buffer.remaining()).toBe(2);
    expect(buffer.get()).toBe(0xd83d);
    expect(buffer.get()).toBe(0xde00);
  });

  it("writes nothing when a string does not fit", () => {
    const buffer = CharBuffer.allocate(2);

    expect(() => buffer.putString("abc")).toThrow(BufferOverflowError);
    expect(buffer.position()).toBe(0);

    buffer.putString("ab").flip();
    expect(buffer.toString()).toBe("ab");
  });

  it("copies the remaining units of another buffer", () => {
    const source = CharBuffer.wrap("xyz");
    source.get();
    const target = CharBuffer.allocate(3).put(0x41).putAll(source);

    expect(source.hasRemaining()).toBe(false);
    expect(target.flip().toString()).toBe("Ayz");
  });

  it("renders text longer than one chunk", () => {
    const text = "ab".repeat(10_000);

    expect(CharBuffer.wrap(text).toString()).toBe(text);
  });

  it("wraps a code unit array without copying", () => {
    const units = new Uint16Array([0x61, 0x62]);
    const buffer = CharBuffer.wrapUnits(units);
    units[0] = 0x7a;

    expect(buffer.toString()).toBe("zb");
  });

  it("rejects writes through read-only views", () => {
    const view = CharBuffer.wrap("abc").asReadOnlyBuffer();

    expect(view.hasArray()).toBe(false);
    expect(() => view.putString("x")).toThrow(ReadOnlyBufferError);
    expect(view.slice().toString()).toBe("abc");
    expect(view.slice().isReadOnly()).toBe(true);
  });
});
