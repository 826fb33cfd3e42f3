import { describe, expect, it } from "vitest";
import { ByteBuffer } from "../../buffers/byte_buffer.ts";
import { CharBuffer } from "../../buffers/char_buffer.ts";
import { Charset } from "../charset.ts";
import { CharsetDecoder } from "../charset_decoder.ts";
import type { CharsetEncoder } from "../charset_encoder.ts";
import { CoderResult } from "../coder_result.ts";
import { CodingErrorAction } from "../coding_error_action.ts";
import {
  CoderMalfunctionError,
  CoderStateError,
  MalformedInputError,
} from "../coding_errors.ts";
import { US_ASCII } from "../latin1_family.ts";
import { UTF_8 } from "../utf8.ts";

function wrap(...values: number[]): ByteBuffer {
  return ByteBuffer.wrap(new Uint8Array(values));
}

/** A decoder whose loop reads one byte more than it was given. */
class OverreadingCharset extends Charset {
  constructor() {
    super("x-overreading");
  }

  public newDecoder(): CharsetDecoder {
    return new OverreadingDecoder(this);
  }

  public newEncoder(): CharsetEncoder {
    return US_ASCII.newEncoder();
  }
}

class OverreadingDecoder extends CharsetDecoder {
  constructor(charset: Charset) {
    super(charset, 1, 1);
  }

  protected override codingLoop(
    input: ByteBuffer,
    _output: CharBuffer,
  ): CoderResult {
    input.get();
    input.get();
    return CoderResult.UNDERFLOW;
  }
}

describe("CharsetDecoder", () => {
  it("starts with REPORT for both error kinds", () => {
    const decoder = US_ASCII.newDecoder();

    expect(decoder.malformedInputAction()).toBe(CodingErrorAction.REPORT);
    expect(decoder.unmappableCharacterAction()).toBe(CodingErrorAction.REPORT);
    expect(decoder.replacement()).toBe("\uFFFD");
    expect(decoder.charset()).toBe(US_ASCII);
  });

  it("moves through its states", () => {
    const decoder = US_ASCII.newDecoder();
    const output = CharBuffer.allocate(4);

    expect(decoder.state()).toBe("RESET");
    expect(() => decoder.flush(output)).toThrow(
      "Cannot flush in state RESET",
    );

    expect(decoder.decodeStep(wrap(0x41), output, false).isUnderflow())
      .toBe(true);
    expect(decoder.state()).toBe("CODING");

    expect(decoder.decodeStep(wrap(0x42), output, true).isUnderflow())
      .toBe(true);
    expect(decoder.state()).toBe("END");
    expect(() => decoder.decodeStep(wrap(0x43), output, false)).toThrow(
      CoderStateError,
    );

    expect(decoder.flush(output).isUnderflow()).toBe(true);
    expect(decoder.state()).toBe("FLUSHED");
    expect(decoder.flush(output).isUnderflow()).toBe(true);
    expect(() => decoder.decodeStep(wrap(0x43), output, true)).toThrow(
      "Cannot code the end of input in state FLUSHED",
    );

    expect(decoder.reset().state()).toBe("RESET");
    expect(output.flip().toString()).toBe("AB");
  });

  it("applies the configured malformed-input action", () => {
    const decode = (action: CodingErrorAction) =>
      US_ASCII.newDecoder()
        .onMalformedInput(action)
        .decodeAll(wrap(0x41, 0xff, 0x42))
        .toString();

    expect(decode(CodingErrorAction.IGNORE)).toBe("AB");
    expect(decode(CodingErrorAction.REPLACE)).toBe("A\uFFFDB");
    expect(() => decode(CodingErrorAction.REPORT)).toThrow(
      MalformedInputError,
    );
  });

  it("leaves the input at the offending byte when reporting", () => {
    const input = wrap(0x41, 0xff, 0x42);
    const output = CharBuffer.allocate(3);
    const result = US_ASCII.newDecoder().decodeStep(input, output, true);

    expect(result.toString()).toBe("MALFORMED[1]");
    expect(input.position()).toBe(1);
    expect(output.flip().toString()).toBe("A");
  });

  it("overflows when the replacement does not fit", () => {
    const input = wrap(0xff);
    const decoder = US_ASCII.newDecoder()
      .onMalformedInput(CodingErrorAction.REPLACE);

    expect(decoder.decodeStep(input, CharBuffer.allocate(0), true).isOverflow())
      .toBe(true);
    expect(input.position()).toBe(0);
  });

  it("reports a sequence truncated by the end of input as malformed", () => {
    const input = wrap(0xe2, 0x82);
    const decoder = UTF_8.newDecoder();

    expect(decoder.decodeStep(input, CharBuffer.allocate(4), false).isUnderflow())
      .toBe(true);
    expect(input.position()).toBe(0);

    decoder.reset();
    const result = decoder.decodeStep(input, CharBuffer.allocate(4), true);
    expect(result.isMalformed()).toBe(true);
    expect(result.length()).toBe(2);
  });

  it("validates replacements", () => {
    const decoder = US_ASCII.newDecoder();

    expect(() => decoder.replaceWith("")).toThrow(
      "Replacement must not be empty",
    );
    expect(() => decoder.replaceWith("??")).toThrow(
      "Replacement is longer than maxCharsPerByte=1",
    );

    decoder.replaceWith("?").onMalformedInput(CodingErrorAction.REPLACE);
    expect(decoder.decodeAll(wrap(0x80)).toString()).toBe("?");
  });

  it("grows the output of a single-shot decode", () => {
    const input = wrap(0xf0, 0x9f, 0x98, 0x80, 0x41);

    expect(UTF_8.newDecoder().decodeAll(input).toString()).toBe(
      "\u{1F600}A",
    );
    expect(input.hasRemaining()).toBe(false);
  });

  it("wraps buffer errors from a misbehaving loop", () => {
    const decoder = new OverreadingCharset().newDecoder();

    expect(() => decoder.decodeAll(wrap(0x41))).toThrow(
      CoderMalfunctionError,
    );
  });
});
