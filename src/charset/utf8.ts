import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import type { CharBuffer } from "../buffers/char_buffer.ts";
import { Charset } from "./charset.ts";
import { CharsetDecoder } from "./charset_decoder.ts";
import { CharsetEncoder } from "./charset_encoder.ts";
import { CoderResult } from "./coder_result.ts";
import {
  highSurrogateOf,
  isHighSurrogate,
  isLowSurrogate,
  lowSurrogateOf,
  toCodePoint,
} from "./utf16.ts";

/**
 * Total length of the sequence a lead byte starts, or 0 when the byte can
 * never start a well-formed sequence.
 */
function sequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

/**
 * Whether `byte` may follow `lead` at `index` (1-based) of a sequence.
 * The narrowed second-byte ranges exclude overlongs, surrogates and code
 * points above U+10FFFF.
 */
function isValidTrail(lead: number, index: number, byte: number): boolean {
  if (index === 1) {
    switch (lead) {
      case 0xe0:
        return byte >= 0xa0 && byte <= 0xbf;
      case 0xed:
        return byte >= 0x80 && byte <= 0x9f;
      case 0xf0:
        return byte >= 0x90 && byte <= 0xbf;
      case 0xf4:
        return byte >= 0x80 && byte <= 0x8f;
    }
  }
  return byte >= 0x80 && byte <= 0xbf;
}

const LEAD_PAYLOAD_MASK = [0, 0x7f, 0x1f, 0x0f, 0x07];

/**
 * UTF-8 with strict well-formedness checks. Malformed lengths follow the
 * maximal-subpart rule: the reported length covers the bytes that were a
 * valid prefix before the offending byte.
 */
export class Utf8Charset extends Charset {
  constructor() {
    super("UTF-8", ["UTF8", "unicode-1-1-utf-8"]);
  }

  public override contains(_other: Charset): boolean {
    return true;
  }

  public newDecoder(): CharsetDecoder {
    return new Utf8Decoder(this);
  }

  public newEncoder(): CharsetEncoder {
    return new Utf8Encoder(this);
  }
}

class Utf8Decoder extends CharsetDecoder {
  constructor(charset: Charset) {
    super(charset, 1, 1);
  }

  protected override codingLoop(
    input: ByteBuffer,
    output: CharBuffer,
  ): CoderResult {
    while (input.hasRemaining()) {
      const start = input.position();
      const lead = input.get();
      const length = sequenceLength(lead);
      if (length === 0) {
        input.setPosition(start);
        return CoderResult.malformedForLength(1);
      }

      // Validate the trail bytes already visible before asking for more, so
      // a sequence split across steps fails exactly where a whole one would.
      const visible = Math.min(length - 1, input.remaining());
      let codePoint = lead & LEAD_PAYLOAD_MASK[length];
      for (let index = 1; index <= visible; index++) {
        const trail = input.get();
        if (!isValidTrail(lead, index, trail)) {
          input.setPosition(start);
          return CoderResult.malformedForLength(index);
        }
        codePoint = (codePoint << 6) | (trail & 0x3f);
      }
      if (visible < length - 1) {
        input.setPosition(start);
        return CoderResult.UNDERFLOW;
      }

      if (codePoint >= 0x10000) {
        if (output.remaining() < 2) {
          input.setPosition(start);
          return CoderResult.OVERFLOW;
        }
        output.put(highSurrogateOf(codePoint));
        output.put(lowSurrogateOf(codePoint));
      } else {
        if (!output.hasRemaining()) {
          input.setPosition(start);
          return CoderResult.OVERFLOW;
        }
        output.put(codePoint);
      }
    }
    return CoderResult.UNDERFLOW;
  }
}

class Utf8Encoder extends CharsetEncoder {
  constructor(charset: Charset) {
    super(charset, 1.1, 3);
  }

  protected override codingLoop(
    input: CharBuffer,
    output: ByteBuffer,
  ): CoderResult {
    while (input.hasRemaining()) {
      const start = input.position();
      const unit = input.get();
      let codePoint = unit;

      if (isHighSurrogate(unit)) {
        if (!input.hasRemaining()) {
          input.setPosition(start);
          return CoderResult.UNDERFLOW;
        }
        const low = input.get();
        if (!isLowSurrogate(low)) {
          input.setPosition(start);
          return CoderResult.malformedForLength(1);
        }
        codePoint = toCodePoint(unit, low);
      } else if (isLowSurrogate(unit)) {
        input.setPosition(start);
        return CoderResult.malformedForLength(1);
      }

      const size = codePoint < 0x80
        ? 1
        : codePoint < 0x800
        ? 2
        : codePoint < 0x10000
        ? 3
        : 4;
      if (output.remaining() < size) {
        input.setPosition(start);
        return CoderResult.OVERFLOW;
      }
      switch (size) {
        case 1:
          output.put(codePoint);
          break;
        case 2:
          output.put(0xc0 | (codePoint >> 6));
          output.put(0x80 | (codePoint & 0x3f));
          break;
        case 3:
          output.put(0xe0 | (codePoint >> 12));
          output.put(0x80 | ((codePoint >> 6) & 0x3f));
          output.put(0x80 | (codePoint & 0x3f));
          break;
        default:
          output.put(0xf0 | (codePoint >> 18));
          output.put(0x80 | ((codePoint >> 12) & 0x3f));
          output.put(0x80 | ((codePoint >> 6) & 0x3f));
          output.put(0x80 | (codePoint & 0x3f));
      }
    }
    return CoderResult.UNDERFLOW;
  }
}

export const UTF_8: Utf8Charset = new Utf8Charset();
