import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import type { CharBuffer } from "../buffers/char_buffer.ts";
import type { Charset } from "../charset/charset.ts";
import type { ConformanceOptions } from "../config.ts";
import { assertDecodeConformance } from "./decode_conformance.ts";
import { assertEncodeConformance } from "./encode_conformance.ts";
import type { ByteOutputPart, CharOutputPart } from "./output_part.ts";
import { decodeCase, encodeCase } from "./test_case.ts";

/**
 * Conformance checks bound to one charset, for use inside test suites.
 *
 * @example
 * ```typescript
 * const conformance = new CharsetConformance(US_ASCII);
 * conformance.testDecode(bytes`41 ff 42`, ...expectChars`A${malformed(1)}B`);
 * conformance.testEncode(chars`Aé`, ...expectBytes`41 ${unmappable(1)}`);
 * ```
 */
export class CharsetConformance {
  readonly #charset: Charset;
  readonly #options: ConformanceOptions;

  constructor(charset: Charset, options: ConformanceOptions = {}) {
    this.#charset = charset;
    this.#options = options;
  }

  public charset(): Charset {
    return this.#charset;
  }

  /** Throws ConformanceMismatchError unless decoding `input` conforms. */
  public testDecode(input: ByteBuffer, ...expected: CharOutputPart[]): void {
    assertDecodeConformance(
      this.#charset,
      decodeCase(input, ...expected),
      this.#options,
    );
  }

  /** Throws ConformanceMismatchError unless encoding `input` conforms. */
  public testEncode(input: CharBuffer, ...expected: ByteOutputPart[]): void {
    assertEncodeConformance(
      this.#charset,
      encodeCase(input, ...expected),
      this.#options,
    );
  }
}
