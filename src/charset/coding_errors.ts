/**
 * Error classes raised by charset decoders and encoders.
 */

/** Which kind of coding failure occurred. */
export type CodingFailureKind = "malformed" | "unmappable";

/**
 * Base class for failures detected in the input of a codec.
 */
export abstract class CharacterCodingError extends Error {
  /** Number of input units making up the offending sequence. */
  public readonly inputLength: number;
  public abstract readonly kind: CodingFailureKind;

  protected constructor(message: string, inputLength: number) {
    super(message);
    this.inputLength = inputLength;
  }
}

/**
 * The input is not a legal sequence of the source encoding.
 */
export class MalformedInputError extends CharacterCodingError {
  public override readonly kind = "malformed";

  constructor(inputLength: number) {
    super(`Input length = ${inputLength}`, inputLength);
    this.name = "MalformedInputError";
  }
}

/**
 * The input is legal but has no representation in the target encoding.
 */
export class UnmappableCharacterError extends CharacterCodingError {
  public override readonly kind = "unmappable";

  constructor(inputLength: number) {
    super(`Input length = ${inputLength}`, inputLength);
    this.name = "UnmappableCharacterError";
  }
}

/**
 * A decoder or encoder operation was invoked in a state that does not allow
 * it, for example `flush` before the end of input was signalled.
 */
export class CoderStateError extends Error {
  /** The state the coder was in. */
  public readonly state: string;
  /** The operation that was refused. */
  public readonly operation: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} in state ${state}`);
    this.name = "CoderStateError";
    this.operation = operation;
    this.state = state;
  }
}

/**
 * A codec loop violated its contract by running off the end of a buffer.
 */
export class CoderMalfunctionError extends Error {
  constructor(cause: Error) {
    super(`Coding loop malfunctioned: ${cause.message}`, { cause });
    this.name = "CoderMalfunctionError";
  }
}
