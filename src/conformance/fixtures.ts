/**
 * Tagged templates for writing conformance fixtures.
 *
 * @example
 * ```typescript
 * bytes`e2 82 ac`;                        // ByteBuffer [e2 82 ac]
 * bytes`41 ${0xff} 42`;                   // ByteBuffer [41 ff 42]
 * chars`caf${"é"}`;                   // CharBuffer "café"
 * expectChars`A${malformed(1)}B`;         // [literal("A"), malformed(1), literal("B")]
 * expectBytes`41 ${unmappable(1)} 42`;    // [literal([41]), unmappable(1), literal([42])]
 * ```
 *
 * Each tag can also be called as a plain function with a single string.
 */

import { ByteBuffer } from "../buffers/byte_buffer.ts";
import { CharBuffer } from "../buffers/char_buffer.ts";
import {
  BYTE_SEQUENCE,
  type ByteOutputPart,
  CHAR_SEQUENCE,
  type CharOutputPart,
  isOutputPart,
  literal,
  type OutputPart,
  type UnitSequence,
} from "./output_part.ts";

/** Bytes spliced into a `bytes` or `expectBytes` template. */
export type ByteFragment = number | readonly number[] | Uint8Array;

/** Values spliced into a `chars` or `expectChars` template. */
export type CharFragment = string | number;

/**
 * A fixture literal could not be parsed.
 */
export class FixtureSyntaxError extends Error {
  /** The offending template text. */
  public readonly text: string;

  constructor(message: string, text: string) {
    super(`${message}: "${text}"`);
    this.name = "FixtureSyntaxError";
    this.text = text;
  }
}

type TemplateInput = TemplateStringsArray | string;

function literalsOf(strings: TemplateInput, fragmentCount: number): readonly string[] {
  const literals = typeof strings === "string" ? [strings] : strings;
  if (literals.length !== fragmentCount + 1) {
    throw new FixtureSyntaxError(
      `Expected ${literals.length - 1} spliced fragments, got ${fragmentCount}`,
      literals.join("${}"),
    );
  }
  return literals;
}

function parseHex(text: string): number[] {
  const digits = text.replace(/\s+/g, "");
  if (digits.length % 2 !== 0) {
    throw new FixtureSyntaxError("Odd number of hex digits", text);
  }
  const result: number[] = [];
  for (let i = 0; i < digits.length; i += 2) {
    const pair = digits.slice(i, i + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new FixtureSyntaxError(`Invalid hex digits "${pair}"`, text);
    }
    result.push(Number.parseInt(pair, 16));
  }
  return result;
}

function toByte(value: number): number {
  if (!Number.isInteger(value) || value < -128 || value > 255) {
    throw new RangeError(`Byte value must be within [-128, 255]. Got ${value}`);
  }
  return value & 0xff;
}

function fragmentBytes(fragment: ByteFragment): number[] {
  if (typeof fragment === "number") {
    return [toByte(fragment)];
  }
  return Array.from(fragment, toByte);
}

function hexTemplate(
  strings: TemplateInput,
  fragments: readonly ByteFragment[],
): Uint8Array {
  const literals = literalsOf(strings, fragments.length);
  const result = parseHex(literals[0]);
  fragments.forEach((fragment, i) => {
    result.push(...fragmentBytes(fragment), ...parseHex(literals[i + 1]));
  });
  return Uint8Array.from(result);
}

function textTemplate(
  strings: TemplateInput,
  fragments: readonly CharFragment[],
): string {
  const literals = literalsOf(strings, fragments.length);
  let text = literals[0];
  fragments.forEach((fragment, i) => {
    text += String(fragment) + literals[i + 1];
  });
  return text;
}

/** Hex digit pairs (whitespace ignored) plus spliced bytes, as a buffer. */
export function bytes(
  strings: TemplateInput,
  ...fragments: ByteFragment[]
): ByteBuffer {
  return ByteBuffer.wrap(hexTemplate(strings, fragments));
}

/** Text plus spliced values, as a buffer. */
export function chars(
  strings: TemplateInput,
  ...fragments: CharFragment[]
): CharBuffer {
  return CharBuffer.wrap(textTemplate(strings, fragments));
}

/**
 * Collects literal runs and spliced parts in source order. Adjacent literals
 * are merged and empty ones dropped.
 */
function collectParts<T, F>(
  literals: readonly string[],
  fragments: readonly (F | OutputPart<T>)[],
  parseLiteral: (text: string) => T,
  renderFragment: (fragment: F) => T,
  sequence: UnitSequence<T>,
): OutputPart<T>[] {
  const parts: OutputPart<T>[] = [];
  let pending: T[] = [];
  const flushPending = () => {
    const units = sequence.concat(pending);
    pending = [];
    if (sequence.length(units) > 0) {
      parts.push(literal(units));
    }
  };

  pending.push(parseLiteral(literals[0]));
  fragments.forEach((fragment, i) => {
    if (!isOutputPart<T>(fragment)) {
      pending.push(renderFragment(fragment));
    } else if (fragment.kind === "literal") {
      pending.push(fragment.units);
    } else {
      flushPending();
      parts.push(fragment);
    }
    pending.push(parseLiteral(literals[i + 1]));
  });
  flushPending();
  return parts;
}

/** Expected decoder output: text with spliced values and error parts. */
export function expectChars(
  strings: TemplateInput,
  ...fragments: (CharFragment | CharOutputPart)[]
): CharOutputPart[] {
  return collectParts<string, CharFragment>(
    literalsOf(strings, fragments.length),
    fragments,
    (text) => text,
    (fragment) => String(fragment),
    CHAR_SEQUENCE,
  );
}

/** Expected encoder output: hex digits with spliced bytes and error parts. */
export function expectBytes(
  strings: TemplateInput,
  ...fragments: (ByteFragment | ByteOutputPart)[]
): ByteOutputPart[] {
  return collectParts<Uint8Array, ByteFragment>(
    literalsOf(strings, fragments.length),
    fragments,
    (text) => Uint8Array.from(parseHex(text)),
    (fragment) => Uint8Array.from(fragmentBytes(fragment)),
    BYTE_SEQUENCE,
  );
}
