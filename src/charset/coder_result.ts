import {
  BufferOverflowError,
  BufferUnderflowError,
} from "../buffers/buffer_error.ts";
import {
  CoderStateError,
  MalformedInputError,
  UnmappableCharacterError,
} from "./coding_errors.ts";

type CoderResultKind = "underflow" | "overflow" | "malformed" | "unmappable";

const malformedCache = new Map<number, CoderResult>();
const unmappableCache = new Map<number, CoderResult>();

/**
 * Outcome of one decoder or encoder step.
 *
 * UNDERFLOW means the step consumed what it could and needs more input;
 * OVERFLOW means the output buffer is full. Error results carry the length
 * of the offending input, whose first unit sits at the input position.
 */
export class CoderResult {
  public static readonly UNDERFLOW = new CoderResult("underflow", 0);
  public static readonly OVERFLOW = new CoderResult("overflow", 0);

  readonly #kind: CoderResultKind;
  readonly #length: number;

  private constructor(kind: CoderResultKind, length: number) {
    this.#kind = kind;
    this.#length = length;
  }

  public static malformedForLength(length: number): CoderResult {
    return CoderResult.#cached(malformedCache, "malformed", length);
  }

  public static unmappableForLength(length: number): CoderResult {
    return CoderResult.#cached(unmappableCache, "unmappable", length);
  }

  static #cached(
    cache: Map<number, CoderResult>,
    kind: "malformed" | "unmappable",
    length: number,
  ): CoderResult {
    if (!Number.isInteger(length) || length <= 0) {
      throw new RangeError(
        `Error result length must be a positive integer. Got ${length}`,
      );
    }
    let result = cache.get(length);
    if (!result) {
      result = new CoderResult(kind, length);
      cache.set(length, result);
    }
    return result;
  }

  public isUnderflow(): boolean {
    return this.#kind === "underflow";
  }

  public isOverflow(): boolean {
    return this.#kind === "overflow";
  }

  public isError(): boolean {
    return this.#kind === "malformed" || this.#kind === "unmappable";
  }

  public isMalformed(): boolean {
    return this.#kind === "malformed";
  }

  public isUnmappable(): boolean {
    return this.#kind === "unmappable";
  }

  /** Length of the offending input; only defined for error results. */
  public length(): number {
    if (!this.isError()) {
      throw new CoderStateError("read the length of", this.#kind);
    }
    return this.#length;
  }

  /**
   * Raises the error this result stands for: a buffer error for
   * UNDERFLOW/OVERFLOW, a coding error otherwise.
   */
  public throwError(): never {
    switch (this.#kind) {
      case "underflow":
        throw new BufferUnderflowError("Coder underflow", 0, 0);
      case "overflow":
        throw new BufferOverflowError("Coder overflow", 0, 0);
      case "malformed":
        throw new MalformedInputError(this.#length);
      case "unmappable":
        throw new UnmappableCharacterError(this.#length);
    }
  }

  public toString(): string {
    return this.isError()
      ? `${this.#kind.toUpperCase()}[${this.#length}]`
      : this.#kind.toUpperCase();
  }
}
