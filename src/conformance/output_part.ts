/**
 * Building blocks of an expected codec output.
 *
 * An expected output is an ordered list of parts: verbatim fragments plus
 * markers for the places where the input is malformed or unmappable. The
 * unit sequence type is `string` for decoded text and `Uint8Array` for
 * encoded bytes.
 */

/** A fragment the codec must produce verbatim. */
export interface LiteralPart<T> {
  readonly kind: "literal";
  readonly units: T;
}

/** `length` input units that the codec must treat as malformed. */
export interface MalformedPart {
  readonly kind: "malformed";
  readonly length: number;
}

/** `length` input units that the codec must treat as unmappable. */
export interface UnmappablePart {
  readonly kind: "unmappable";
  readonly length: number;
}

export type ErrorPart = MalformedPart | UnmappablePart;

export type OutputPart<T> = LiteralPart<T> | ErrorPart;

/** Parts of an expected decoder output. */
export type CharOutputPart = OutputPart<string>;

/** Parts of an expected encoder output. */
export type ByteOutputPart = OutputPart<Uint8Array>;

export function literal<T>(units: T): LiteralPart<T> {
  const part: LiteralPart<T> = { kind: "literal", units };
  return Object.freeze(part);
}

/** Throws a RangeError unless `length` is a positive integer. */
export function malformed(length: number): MalformedPart {
  const part: MalformedPart = { kind: "malformed", length: checkLength(length) };
  return Object.freeze(part);
}

export function unmappable(length: number): UnmappablePart {
  const part: UnmappablePart = {
    kind: "unmappable",
    length: checkLength(length),
  };
  return Object.freeze(part);
}

/**
 * Whether `value` is a part built by {@link literal}, {@link malformed} or
 * {@link unmappable}.
 */
export function isOutputPart<T>(value: unknown): value is OutputPart<T> {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return false;
  }
  switch (value.kind) {
    case "literal":
      return "units" in value;
    case "malformed":
    case "unmappable":
      return "length" in value && typeof value.length === "number";
    default:
      return false;
  }
}

function checkLength(length: number): number {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(
      `Error part length must be a positive integer. Got ${length}`,
    );
  }
  return length;
}

/**
 * Operations the harness needs on a unit sequence type.
 */
export interface UnitSequence<T> {
  empty(): T;
  concat(chunks: readonly T[]): T;
  length(units: T): number;
  equals(a: T, b: T): boolean;
  /** Human-readable rendering for mismatch reports. */
  describe(units: T): string;
}

export const CHAR_SEQUENCE: UnitSequence<string> = {
  empty: () => "",
  concat: (chunks) => chunks.join(""),
  length: (units) => units.length,
  equals: (a, b) => a === b,
  describe: (units) => JSON.stringify(units),
};

export const BYTE_SEQUENCE: UnitSequence<Uint8Array> = {
  empty: () => new Uint8Array(0),
  concat: (chunks) => {
    const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  },
  length: (units) => units.length,
  equals: (a, b) => a.length === b.length && a.every((byte, i) => byte === b[i]),
  describe: (units) =>
    `[${
      Array.from(units, (byte) => byte.toString(16).padStart(2, "0")).join(" ")
    }]`,
};
