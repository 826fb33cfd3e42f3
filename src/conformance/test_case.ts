import { ByteBuffer } from "../buffers/byte_buffer.ts";
import { CharBuffer } from "../buffers/char_buffer.ts";
import type { ByteOutputPart, CharOutputPart } from "./output_part.ts";

/** Bytes to decode and the text they must decode to. */
export interface DecodeCase {
  readonly input: ByteBuffer;
  readonly expected: readonly CharOutputPart[];
}

/** Text to encode and the bytes it must encode to. */
export interface EncodeCase {
  readonly input: CharBuffer;
  readonly expected: readonly ByteOutputPart[];
}

/**
 * Builds a frozen decode case. The remaining bytes of `input` are copied,
 * so later changes to `input` do not leak into the case.
 */
export function decodeCase(
  input: ByteBuffer,
  ...expected: CharOutputPart[]
): DecodeCase {
  return Object.freeze({
    input: ByteBuffer.wrap(input.toUint8Array()),
    expected: Object.freeze([...expected]),
  });
}

export function encodeCase(
  input: CharBuffer,
  ...expected: ByteOutputPart[]
): EncodeCase {
  return Object.freeze({
    input: CharBuffer.wrap(input.toString()),
    expected: Object.freeze([...expected]),
  });
}
