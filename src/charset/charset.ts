import { CharBuffer } from "../buffers/char_buffer.ts";
import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import type { CharsetDecoder } from "./charset_decoder.ts";
import type { CharsetEncoder } from "./charset_encoder.ts";
import { CodingErrorAction } from "./coding_error_action.ts";
import { IllegalCharsetNameError } from "./charset_errors.ts";

const LEGAL_NAME = /^[A-Za-z0-9][A-Za-z0-9\-+:_.]*$/;

/**
 * Throws an IllegalCharsetNameError unless `name` starts with a letter or
 * digit and continues with letters, digits or `- + : _ .`.
 */
export function checkCharsetName(name: string): void {
  if (!LEGAL_NAME.test(name)) {
    throw new IllegalCharsetNameError(name);
  }
}

/**
 * A named character encoding: a factory for its decoders and encoders.
 */
export abstract class Charset {
  readonly #name: string;
  readonly #aliases: ReadonlySet<string>;

  protected constructor(canonicalName: string, aliases: readonly string[] = []) {
    checkCharsetName(canonicalName);
    for (const alias of aliases) {
      checkCharsetName(alias);
    }
    this.#name = canonicalName;
    this.#aliases = new Set(aliases);
  }

  public name(): string {
    return this.#name;
  }

  public aliases(): ReadonlySet<string> {
    return this.#aliases;
  }

  public displayName(): string {
    return this.#name;
  }

  public abstract newDecoder(): CharsetDecoder;

  public abstract newEncoder(): CharsetEncoder;

  /** Whether this charset supports encoding at all. */
  public canEncode(): boolean {
    return true;
  }

  /**
   * Whether every character representable in `other` is representable in
   * this charset. The default only knows that a charset contains itself.
   */
  public contains(other: Charset): boolean {
    return other.name() === this.#name;
  }

  /** Decodes with REPLACE for both error kinds. */
  public decode(bytes: ByteBuffer): CharBuffer {
    return this.newDecoder()
      .onMalformedInput(CodingErrorAction.REPLACE)
      .onUnmappableCharacter(CodingErrorAction.REPLACE)
      .decodeAll(bytes);
  }

  /** Encodes with REPLACE for both error kinds. */
  public encode(text: string | CharBuffer): ByteBuffer {
    const chars = typeof text === "string" ? CharBuffer.wrap(text) : text;
    return this.newEncoder()
      .onMalformedInput(CodingErrorAction.REPLACE)
      .onUnmappableCharacter(CodingErrorAction.REPLACE)
      .encodeAll(chars);
  }

  public toString(): string {
    return this.#name;
  }
}
