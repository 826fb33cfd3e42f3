import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import { CharBuffer } from "../buffers/char_buffer.ts";
import type { Charset } from "./charset.ts";
import { CharsetCoder } from "./charset_coder.ts";
import type { CoderResult } from "./coder_result.ts";

/**
 * Turns bytes of one charset into UTF-16 chars.
 *
 * @example
 * ```typescript
 * const decoder = UTF_8.newDecoder()
 *   .onMalformedInput(CodingErrorAction.REPLACE);
 * decoder.decodeAll(ByteBuffer.wrap(new Uint8Array([0x41, 0xff]))).toString();
 * // "A\uFFFD"
 * ```
 */
export abstract class CharsetDecoder extends CharsetCoder<ByteBuffer, CharBuffer> {
  #replacement: string;

  protected constructor(
    charset: Charset,
    averageCharsPerByte: number,
    maxCharsPerByte: number,
    replacement = "\uFFFD",
  ) {
    super(charset, averageCharsPerByte, maxCharsPerByte);
    this.#replacement = this.#checkReplacement(replacement);
  }

  public averageCharsPerByte(): number {
    return this.averageOutPerIn();
  }

  public maxCharsPerByte(): number {
    return this.maxOutPerIn();
  }

  /** Chars written in place of bad input under REPLACE. */
  public replacement(): string {
    return this.#replacement;
  }

  public replaceWith(newReplacement: string): this {
    this.#replacement = this.#checkReplacement(newReplacement);
    return this;
  }

  /**
   * Decodes the remaining bytes of `input` into `output`. Pass
   * `endOfInput = false` while more bytes may follow; partial sequences are
   * then left in `input` for the next call.
   */
  public decodeStep(
    input: ByteBuffer,
    output: CharBuffer,
    endOfInput: boolean,
  ): CoderResult {
    return this.step(input, output, endOfInput);
  }

  /**
   * Decodes every remaining byte of `input` with a freshly reset decoder.
   * Throws MalformedInputError or UnmappableCharacterError when the
   * configured action is REPORT.
   */
  public decodeAll(input: ByteBuffer): CharBuffer {
    return this.convertAll(
      input,
      (capacity) => CharBuffer.allocate(capacity),
      (filled, capacity) => CharBuffer.allocate(capacity).putAll(filled),
    );
  }

  protected override replacementLength(): number {
    return this.#replacement.length;
  }

  protected override writeReplacement(output: CharBuffer): void {
    output.putString(this.#replacement);
  }

  #checkReplacement(replacement: string): string {
    if (replacement.length === 0) {
      throw new RangeError("Replacement must not be empty");
    }
    if (replacement.length > this.maxCharsPerByte()) {
      throw new RangeError(
        `Replacement is longer than maxCharsPerByte=${this.maxCharsPerByte()}`,
      );
    }
    return replacement;
  }
}
