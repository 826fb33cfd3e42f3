import { describe, expect, it } from "vitest";
import { ByteBuffer } from "../../buffers/byte_buffer.ts";
import { CharBuffer } from "../../buffers/char_buffer.ts";
import { CharsetConformance } from "../../conformance/charset_conformance.ts";
import {
  bytes,
  chars,
  expectBytes,
  expectChars,
} from "../../conformance/fixtures.ts";
import { literal, malformed } from "../../conformance/output_part.ts";
import { CodingErrorAction } from "../coding_error_action.ts";
import { MalformedInputError } from "../coding_errors.ts";
import { UTF_8 } from "../utf8.ts";

describe("UTF-8", () => {
  const utf8 = new CharsetConformance(UTF_8);

  describe("decoding", () => {
    it("decodes sequences of every length", () => {
      expect(() => utf8.testDecode(bytes`41`, literal("A"))).not.toThrow();
      expect(() => utf8.testDecode(bytes`c3 a9`, literal("é"))).not.toThrow();
      expect(() => utf8.testDecode(bytes`e2 82 ac`, literal("€")))
        .not.toThrow();
      expect(() => utf8.testDecode(bytes`f0 9f 98 80`, literal("\u{1F600}")))
        .not.toThrow();
    });

    it("rejects invalid lead bytes one at a time", () => {
      expect(() => utf8.testDecode(bytes`41 ff 42`, ...expectChars`A${malformed(1)}B`))
        .not.toThrow();
      expect(() =>
        utf8.testDecode(bytes`c0 af`, ...expectChars`${malformed(1)}${malformed(1)}`)
      ).not.toThrow();
    });

    it("sizes malformed sequences by their valid prefix", () => {
      expect(() => utf8.testDecode(bytes`e2 41`, ...expectChars`${malformed(1)}A`))
        .not.toThrow();
      expect(() => utf8.testDecode(bytes`e2 82 41`, ...expectChars`${malformed(2)}A`))
        .not.toThrow();
      expect(() =>
        utf8.testDecode(bytes`f0 9f 98 41`, ...expectChars`${malformed(3)}A`)
      ).not.toThrow();
    });

    it("reports a sequence cut off by the end of input", () => {
      expect(() => utf8.testDecode(bytes`e2 82`, ...expectChars`${malformed(2)}`))
        .not.toThrow();
      expect(() => utf8.testDecode(bytes`41 f0`, ...expectChars`A${malformed(1)}`))
        .not.toThrow();
    });

    it("rejects encoded surrogates", () => {
      expect(() =>
        utf8.testDecode(
          bytes`ed a0 80`,
          ...expectChars`${malformed(1)}${malformed(1)}${malformed(1)}`,
        )
      ).not.toThrow();
    });

    it("rejects code points above U+10FFFF", () => {
      expect(() =>
        utf8.testDecode(
          bytes`f4 90 80 80`,
          ...expectChars`${malformed(1)}${malformed(1)}${malformed(1)}${
            malformed(1)
          }`,
        )
      ).not.toThrow();
    });

    it("decodes U+10FFFF and U+FFFF", () => {
      expect(() =>
        utf8.testDecode(bytes`f4 8f bf bf ef bf bf`, literal("\u{10FFFF}\uFFFF"))
      ).not.toThrow();
    });

    it("underflows until the last byte of a sequence arrives", () => {
      const decoder = UTF_8.newDecoder();
      const input = bytes`e2 82 ac`;
      const output = CharBuffer.allocate(2);

      input.setLimit(1);
      expect(decoder.decodeStep(input, output, false).isUnderflow()).toBe(true);
      expect(output.position()).toBe(0);

      input.setLimit(2);
      expect(decoder.decodeStep(input, output, false).isUnderflow()).toBe(true);
      expect(output.position()).toBe(0);

      input.setLimit(3);
      expect(decoder.decodeStep(input, output, false).isUnderflow()).toBe(true);
      expect(output.flip().toString()).toBe("€");
    });

    it("overflows rather than splitting a surrogate pair", () => {
      const input = bytes`f0 9f 98 80`;
      const result = UTF_8.newDecoder().decodeStep(
        input,
        CharBuffer.allocate(1),
        true,
      );

      expect(result.isOverflow()).toBe(true);
      expect(input.position()).toBe(0);
    });
  });

  describe("encoding", () => {
    it("encodes every sequence length", () => {
      expect(() =>
        utf8.testEncode(
          chars`Aé€\u{1F600}`,
          ...expectBytes`41 c3 a9 e2 82 ac f0 9f 98 80`,
        )
      ).not.toThrow();
    });

    it("reports lone surrogates as malformed", () => {
      expect(() => utf8.testEncode(chars`\uDC00A`, ...expectBytes`${malformed(1)} 41`))
        .not.toThrow();
      expect(() => utf8.testEncode(chars`A\uD800`, ...expectBytes`41 ${malformed(1)}`))
        .not.toThrow();
    });

    it("round-trips through the convenience methods", () => {
      const encoded = UTF_8.encode("naïve €");

      expect(UTF_8.decode(encoded).toString()).toBe("naïve €");
    });

    it("replaces lone surrogates with a question mark", () => {
      expect(UTF_8.encode("a\uD800b").toUint8Array()).toEqual(
        new Uint8Array([0x61, 0x3f, 0x62]),
      );
    });
  });

  it("contains every other charset", () => {
    expect(UTF_8.contains(UTF_8)).toBe(true);
    expect(UTF_8.aliases().has("UTF8")).toBe(true);
  });

  it("throws the reported length from a single-shot decode", () => {
    const decoder = UTF_8.newDecoder()
      .onMalformedInput(CodingErrorAction.REPORT);

    try {
      decoder.decodeAll(ByteBuffer.wrap(new Uint8Array([0xe2, 0x82, 0x41])));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedInputError);
      expect(err).toMatchObject({ inputLength: 2 });
    }
  });
});
