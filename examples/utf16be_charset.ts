// Example: a custom charset plugged into the codec framework.
import type { ByteBuffer } from "../src/buffers/byte_buffer.ts";
import type { CharBuffer } from "../src/buffers/char_buffer.ts";
import { Charset } from "../src/charset/charset.ts";
import { CharsetDecoder } from "../src/charset/charset_decoder.ts";
import { CharsetEncoder } from "../src/charset/charset_encoder.ts";
import { CoderResult } from "../src/charset/coder_result.ts";
import { isHighSurrogate, isLowSurrogate } from "../src/charset/utf16.ts";

/**
 * Big-endian UTF-16 without a byte order mark. Unpaired surrogates are
 * malformed in both directions; a high surrogate at the end of a step waits
 * for its partner.
 */
export class Utf16BeCharset extends Charset {
  constructor() {
    super("UTF-16BE", ["UnicodeBigUnmarked", "X-UTF-16BE"]);
  }

  public newDecoder(): CharsetDecoder {
    return new Utf16BeDecoder(this);
  }

  public newEncoder(): CharsetEncoder {
    return new Utf16BeEncoder(this);
  }
}

function readUnit(input: ByteBuffer): number {
  const high = input.get();
  return (high << 8) | input.get();
}

class Utf16BeDecoder extends CharsetDecoder {
  constructor(charset: Charset) {
    super(charset, 0.5, 1);
  }

  protected override codingLoop(
    input: ByteBuffer,
    output: CharBuffer,
  ): CoderResult {
    while (input.remaining() >= 2) {
      const start = input.position();
      const unit = readUnit(input);

      if (isHighSurrogate(unit)) {
        if (input.remaining() < 2) {
          input.setPosition(start);
          return CoderResult.UNDERFLOW;
        }
        const low = readUnit(input);
        if (!isLowSurrogate(low)) {
          input.setPosition(start);
          return CoderResult.malformedForLength(2);
        }
        if (output.remaining() < 2) {
          input.setPosition(start);
          return CoderResult.OVERFLOW;
        }
        output.put(unit);
        output.put(low);
        continue;
      }

      if (isLowSurrogate(unit)) {
        input.setPosition(start);
        return CoderResult.malformedForLength(2);
      }
      if (!output.hasRemaining()) {
        input.setPosition(start);
        return CoderResult.OVERFLOW;
      }
      output.put(unit);
    }
    return CoderResult.UNDERFLOW;
  }
}

class Utf16BeEncoder extends CharsetEncoder {
  constructor(charset: Charset) {
    super(charset, 2, 2, new Uint8Array([0xff, 0xfd]));
  }

  protected override codingLoop(
    input: CharBuffer,
    output: ByteBuffer,
  ): CoderResult {
    while (input.hasRemaining()) {
      const start = input.position();
      const unit = input.get();
      let size = 2;

      if (isHighSurrogate(unit)) {
        if (!input.hasRemaining()) {
          input.setPosition(start);
          return CoderResult.UNDERFLOW;
        }
        if (!isLowSurrogate(input.get())) {
          input.setPosition(start);
          return CoderResult.malformedForLength(1);
        }
        size = 4;
      } else if (isLowSurrogate(unit)) {
        input.setPosition(start);
        return CoderResult.malformedForLength(1);
      }

      if (output.remaining() < size) {
        input.setPosition(start);
        return CoderResult.OVERFLOW;
      }
      input.setPosition(start);
      for (let i = 0; i < size; i += 2) {
        const char = input.get();
        output.put(char >> 8);
        output.put(char & 0xff);
      }
    }
    return CoderResult.UNDERFLOW;
  }
}

export const UTF_16BE: Utf16BeCharset = new Utf16BeCharset();
