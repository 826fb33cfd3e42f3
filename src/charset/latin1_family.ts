import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import type { CharBuffer } from "../buffers/char_buffer.ts";
import { Charset } from "./charset.ts";
import { CharsetDecoder } from "./charset_decoder.ts";
import { CharsetEncoder } from "./charset_encoder.ts";
import { CoderResult } from "./coder_result.ts";
import { isHighSurrogate, isLowSurrogate } from "./utf16.ts";

/**
 * Single-byte charsets whose byte values equal their code points up to a
 * maximum: US-ASCII (0x7F) and ISO-8859-1 (0xFF).
 */
export class Latin1FamilyCharset extends Charset {
  readonly #maxValue: number;

  constructor(canonicalName: string, aliases: readonly string[], maxValue: number) {
    super(canonicalName, aliases);
    this.#maxValue = maxValue;
  }

  /** Highest byte value, and code point, the charset maps. */
  public maxValue(): number {
    return this.#maxValue;
  }

  public override contains(other: Charset): boolean {
    return other instanceof Latin1FamilyCharset &&
      other.maxValue() <= this.#maxValue;
  }

  public newDecoder(): CharsetDecoder {
    return new Latin1FamilyDecoder(this, this.#maxValue);
  }

  public newEncoder(): CharsetEncoder {
    return new Latin1FamilyEncoder(this, this.#maxValue);
  }
}

class Latin1FamilyDecoder extends CharsetDecoder {
  readonly #maxValue: number;

  constructor(charset: Charset, maxValue: number) {
    super(charset, 1, 1);
    this.#maxValue = maxValue;
  }

  protected override codingLoop(
    input: ByteBuffer,
    output: CharBuffer,
  ): CoderResult {
    while (input.hasRemaining()) {
      const start = input.position();
      const byte = input.get();
      if (byte > this.#maxValue) {
        input.setPosition(start);
        return CoderResult.malformedForLength(1);
      }
      if (!output.hasRemaining()) {
        input.setPosition(start);
        return CoderResult.OVERFLOW;
      }
      output.put(byte);
    }
    return CoderResult.UNDERFLOW;
  }
}

class Latin1FamilyEncoder extends CharsetEncoder {
  readonly #maxValue: number;

  constructor(charset: Charset, maxValue: number) {
    super(charset, 1, 1);
    this.#maxValue = maxValue;
  }

  protected override codingLoop(
    input: CharBuffer,
    output: ByteBuffer,
  ): CoderResult {
    while (input.hasRemaining()) {
      const start = input.position();
      const unit = input.get();
      if (unit <= this.#maxValue) {
        if (!output.hasRemaining()) {
          input.setPosition(start);
          return CoderResult.OVERFLOW;
        }
        output.put(unit);
        continue;
      }

      if (isHighSurrogate(unit)) {
        if (!input.hasRemaining()) {
          // Wait for the low surrogate.
          input.setPosition(start);
          return CoderResult.UNDERFLOW;
        }
        const next = input.get();
        input.setPosition(start);
        return isLowSurrogate(next)
          ? CoderResult.unmappableForLength(2)
          : CoderResult.malformedForLength(1);
      }

      input.setPosition(start);
      return isLowSurrogate(unit)
        ? CoderResult.malformedForLength(1)
        : CoderResult.unmappableForLength(1);
    }
    return CoderResult.UNDERFLOW;
  }
}

export const US_ASCII: Latin1FamilyCharset = new Latin1FamilyCharset(
  "US-ASCII",
  [
    "cp367",
    "ascii7",
    "ISO646-US",
    "646",
    "csASCII",
    "us",
    "iso_646.irv:1983",
    "ISO_646.irv:1991",
    "IBM367",
    "ASCII",
    "default",
    "ANSI_X3.4-1986",
    "ANSI_X3.4-1968",
    "iso-ir-6",
  ],
  0x7f,
);

export const ISO_8859_1: Latin1FamilyCharset = new Latin1FamilyCharset(
  "ISO-8859-1",
  [
    "iso-ir-100",
    "ISO_8859-1",
    "latin1",
    "l1",
    "IBM819",
    "cp819",
    "csISOLatin1",
    "819",
    "IBM-819",
    "ISO8859_1",
    "ISO_8859-1:1987",
    "ISO_8859_1",
    "8859_1",
    "ISO8859-1",
  ],
  0xff,
);
