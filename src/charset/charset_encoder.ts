import { ByteBuffer } from "../buffers/byte_buffer.ts";
import { CharBuffer } from "../buffers/char_buffer.ts";
import type { Charset } from "./charset.ts";
import { CharsetCoder } from "./charset_coder.ts";
import type { CoderResult } from "./coder_result.ts";
import { CodingErrorAction } from "./coding_error_action.ts";
import { CharacterCodingError, CoderStateError } from "./coding_errors.ts";

const QUESTION_MARK = new Uint8Array([0x3f]);

/**
 * Turns UTF-16 chars into bytes of one charset.
 */
export abstract class CharsetEncoder extends CharsetCoder<CharBuffer, ByteBuffer> {
  #replacement: Uint8Array;

  protected constructor(
    charset: Charset,
    averageBytesPerChar: number,
    maxBytesPerChar: number,
    replacement: Uint8Array = QUESTION_MARK,
  ) {
    super(charset, averageBytesPerChar, maxBytesPerChar);
    this.#replacement = this.#checkReplacement(replacement);
  }

  public averageBytesPerChar(): number {
    return this.averageOutPerIn();
  }

  public maxBytesPerChar(): number {
    return this.maxOutPerIn();
  }

  /** A copy of the bytes written in place of bad input under REPLACE. */
  public replacement(): Uint8Array {
    return this.#replacement.slice();
  }

  public replaceWith(newReplacement: Uint8Array): this {
    this.#replacement = this.#checkReplacement(newReplacement);
    return this;
  }

  /**
   * Whether `replacement` decodes cleanly in this encoder's charset.
   */
  public isLegalReplacement(replacement: Uint8Array): boolean {
    const decoder = this.charset().newDecoder()
      .onMalformedInput(CodingErrorAction.REPORT)
      .onUnmappableCharacter(CodingErrorAction.REPORT);
    const input = ByteBuffer.wrap(replacement);
    const output = CharBuffer.allocate(
      Math.ceil(replacement.length * decoder.maxCharsPerByte()),
    );
    return !decoder.decodeStep(input, output, true).isError();
  }

  /**
   * Encodes the remaining chars of `input` into `output`. A high surrogate
   * at the end of a non-final step stays in `input` until its pair arrives.
   */
  public encodeStep(
    input: CharBuffer,
    output: ByteBuffer,
    endOfInput: boolean,
  ): CoderResult {
    return this.step(input, output, endOfInput);
  }

  public encodeAll(input: CharBuffer): ByteBuffer {
    return this.convertAll(
      input,
      (capacity) => ByteBuffer.allocate(capacity),
      (filled, capacity) => ByteBuffer.allocate(capacity).putAll(filled),
    );
  }

  /**
   * Whether `text` encodes without any error. Only allowed while no
   * stepwise conversion is in progress; leaves the encoder reset.
   */
  public canEncode(text: string): boolean {
    const state = this.state();
    if (state === "FLUSHED") {
      this.reset();
    } else if (state !== "RESET") {
      throw new CoderStateError("check encodability", state);
    }
    const malformedAction = this.malformedInputAction();
    const unmappableAction = this.unmappableCharacterAction();
    try {
      this.onMalformedInput(CodingErrorAction.REPORT);
      this.onUnmappableCharacter(CodingErrorAction.REPORT);
      this.encodeAll(CharBuffer.wrap(text));
      return true;
    } catch (err) {
      if (err instanceof CharacterCodingError) {
        return false;
      }
      throw err;
    } finally {
      this.onMalformedInput(malformedAction);
      this.onUnmappableCharacter(unmappableAction);
      this.reset();
    }
  }

  protected override replacementLength(): number {
    return this.#replacement.length;
  }

  protected override writeReplacement(output: ByteBuffer): void {
    output.putAll(this.#replacement);
  }

  #checkReplacement(replacement: Uint8Array): Uint8Array {
    if (replacement.length === 0) {
      throw new RangeError("Replacement must not be empty");
    }
    if (replacement.length > this.maxBytesPerChar()) {
      throw new RangeError(
        `Replacement is longer than maxBytesPerChar=${this.maxBytesPerChar()}`,
      );
    }
    if (!this.isLegalReplacement(replacement)) {
      throw new RangeError("Replacement is not a legal byte sequence");
    }
    return replacement.slice();
  }
}
