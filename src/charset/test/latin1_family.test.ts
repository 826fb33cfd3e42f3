import { describe, expect, it } from "vitest";
import { CharsetConformance } from "../../conformance/charset_conformance.ts";
import {
  bytes,
  chars,
  expectBytes,
  expectChars,
} from "../../conformance/fixtures.ts";
import {
  literal,
  malformed,
  unmappable,
} from "../../conformance/output_part.ts";
import { ISO_8859_1, US_ASCII } from "../latin1_family.ts";

const ALL_BYTES = Array.from({ length: 256 }, (_, i) => i);

describe("US-ASCII", () => {
  const ascii = new CharsetConformance(US_ASCII);

  it("decodes the seven-bit range", () => {
    expect(() =>
      ascii.testDecode(
        bytes`${ALL_BYTES.slice(0, 0x80)}`,
        literal(String.fromCharCode(...ALL_BYTES.slice(0, 0x80))),
      )
    ).not.toThrow();
  });

  it("treats bytes above 0x7F as malformed", () => {
    expect(() => ascii.testDecode(bytes`41 ff 42`, ...expectChars`A${malformed(1)}B`))
      .not.toThrow();
    expect(() =>
      ascii.testDecode(
        bytes`80 81 41`,
        ...expectChars`${malformed(1)}${malformed(1)}A`,
      )
    ).not.toThrow();
  });

  it("encodes ASCII text", () => {
    expect(() => ascii.testEncode(chars`Hello!`, ...expectBytes`48 65 6c 6c 6f 21`))
      .not.toThrow();
  });

  it("reports chars above 0x7F as unmappable", () => {
    expect(() => ascii.testEncode(chars`AéB`, ...expectBytes`41 ${unmappable(1)} 42`))
      .not.toThrow();
  });

  it("reports a surrogate pair as one unmappable character", () => {
    expect(() =>
      ascii.testEncode(chars`\u{1F600}A`, ...expectBytes`${unmappable(2)} 41`)
    ).not.toThrow();
  });

  it("reports lone surrogates as malformed", () => {
    expect(() => ascii.testEncode(chars`\uDE00A`, ...expectBytes`${malformed(1)} 41`))
      .not.toThrow();
    expect(() => ascii.testEncode(chars`\uD83DA`, ...expectBytes`${malformed(1)} 41`))
      .not.toThrow();
    expect(() => ascii.testEncode(chars`A\uD83D`, ...expectBytes`41 ${malformed(1)}`))
      .not.toThrow();
  });

  it("knows its aliases", () => {
    expect(US_ASCII.aliases().has("ANSI_X3.4-1968")).toBe(true);
    expect(US_ASCII.aliases().size).toBe(14);
    expect(US_ASCII.maxValue()).toBe(0x7f);
  });
});

describe("ISO-8859-1", () => {
  const latin1 = new CharsetConformance(ISO_8859_1);

  it("decodes every byte to the code point of the same value", () => {
    expect(() =>
      latin1.testDecode(
        bytes`${ALL_BYTES}`,
        literal(String.fromCharCode(...ALL_BYTES)),
      )
    ).not.toThrow();
  });

  it("encodes Latin-1 text and rejects anything above U+00FF", () => {
    expect(() => latin1.testEncode(chars`café`, ...expectBytes`63 61 66 e9`))
      .not.toThrow();
    expect(() => latin1.testEncode(chars`Āÿ`, ...expectBytes`${unmappable(1)} ff`))
      .not.toThrow();
  });

  it("contains US-ASCII but not the other way round", () => {
    expect(ISO_8859_1.contains(US_ASCII)).toBe(true);
    expect(US_ASCII.contains(ISO_8859_1)).toBe(false);
    expect(ISO_8859_1.contains(ISO_8859_1)).toBe(true);
  });
});
