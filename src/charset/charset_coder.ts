import {
  BufferOverflowError,
  BufferUnderflowError,
} from "../buffers/buffer_error.ts";
import type { Charset } from "./charset.ts";
import { CoderResult } from "./coder_result.ts";
import {
  CodingErrorAction,
  isCodingErrorAction,
} from "./coding_error_action.ts";
import { CoderMalfunctionError, CoderStateError } from "./coding_errors.ts";

/**
 * Lifecycle of a decoder or encoder.
 *
 * RESET → CODING (steps without end of input) → END (a step with end of
 * input) → FLUSHED (`flush` drained the coder). `reset()` returns to RESET
 * from anywhere.
 */
export type CoderState = "RESET" | "CODING" | "END" | "FLUSHED";

/**
 * Cursor operations the shared coding driver needs from its buffers.
 */
export interface CoderBuffer {
  position(): number;
  setPosition(newPosition: number): unknown;
  remaining(): number;
  hasRemaining(): boolean;
  flip(): unknown;
}

/**
 * Driver shared by {@link CharsetDecoder} and {@link CharsetEncoder}.
 *
 * Subclasses provide the coding loop for a single charset; the driver
 * applies the configured error actions around it, tracks the lifecycle and
 * implements the single-shot conversion on top of the stepwise one.
 */
export abstract class CharsetCoder<
  TIn extends CoderBuffer,
  TOut extends CoderBuffer,
> {
  readonly #charset: Charset;
  readonly #averageOutPerIn: number;
  readonly #maxOutPerIn: number;
  #malformedAction: CodingErrorAction = CodingErrorAction.REPORT;
  #unmappableAction: CodingErrorAction = CodingErrorAction.REPORT;
  #state: CoderState = "RESET";

  protected constructor(
    charset: Charset,
    averageOutPerIn: number,
    maxOutPerIn: number,
  ) {
    if (!(averageOutPerIn > 0) || !(maxOutPerIn > 0)) {
      throw new RangeError(
        `Output-per-input ratios must be positive. Got average=${averageOutPerIn}, max=${maxOutPerIn}`,
      );
    }
    if (averageOutPerIn > maxOutPerIn) {
      throw new RangeError(
        `Average output per input (${averageOutPerIn}) exceeds the maximum (${maxOutPerIn})`,
      );
    }
    this.#charset = charset;
    this.#averageOutPerIn = averageOutPerIn;
    this.#maxOutPerIn = maxOutPerIn;
  }

  public charset(): Charset {
    return this.#charset;
  }

  public state(): CoderState {
    return this.#state;
  }

  public malformedInputAction(): CodingErrorAction {
    return this.#malformedAction;
  }

  public onMalformedInput(action: CodingErrorAction): this {
    this.#malformedAction = checkAction(action);
    return this;
  }

  public unmappableCharacterAction(): CodingErrorAction {
    return this.#unmappableAction;
  }

  public onUnmappableCharacter(action: CodingErrorAction): this {
    this.#unmappableAction = checkAction(action);
    return this;
  }

  /**
   * Writes whatever output the coder still holds once the end of input has
   * been signalled. Calling it again after it succeeded is a no-op.
   */
  public flush(output: TOut): CoderResult {
    if (this.#state === "END") {
      const result = this.implFlush(output);
      if (result.isUnderflow()) {
        this.#state = "FLUSHED";
      }
      return result;
    }
    if (this.#state !== "FLUSHED") {
      throw new CoderStateError("flush", this.#state);
    }
    return CoderResult.UNDERFLOW;
  }

  public reset(): this {
    this.implReset();
    this.#state = "RESET";
    return this;
  }

  protected averageOutPerIn(): number {
    return this.#averageOutPerIn;
  }

  protected maxOutPerIn(): number {
    return this.#maxOutPerIn;
  }

  /**
   * One stepwise conversion call. Consumes as much of `input` as possible,
   * applying IGNORE/REPLACE in place and stopping at REPORT, at a full
   * output buffer, or when more input is needed.
   */
  protected step(input: TIn, output: TOut, endOfInput: boolean): CoderResult {
    const next: CoderState = endOfInput ? "END" : "CODING";
    if (
      this.#state !== "RESET" && this.#state !== "CODING" &&
      !(endOfInput && this.#state === "END")
    ) {
      throw new CoderStateError(
        endOfInput ? "code the end of input" : "code more input",
        this.#state,
      );
    }
    this.#state = next;

    for (;;) {
      let result = this.#runLoop(input, output);

      if (result.isOverflow()) {
        return result;
      }
      if (result.isUnderflow()) {
        if (!endOfInput || !input.hasRemaining()) {
          return result;
        }
        // A truncated sequence at the end of input is malformed.
        result = CoderResult.malformedForLength(input.remaining());
      }

      const action = result.isMalformed()
        ? this.#malformedAction
        : this.#unmappableAction;
      if (action === CodingErrorAction.REPORT) {
        return result;
      }
      if (action === CodingErrorAction.REPLACE) {
        if (output.remaining() < this.replacementLength()) {
          return CoderResult.OVERFLOW;
        }
        this.writeReplacement(output);
      }
      input.setPosition(input.position() + result.length());
    }
  }

  /**
   * Converts all remaining input in one go, starting from a reset coder.
   * The output grows as needed; coding errors under REPORT are thrown.
   */
  protected convertAll(
    input: TIn,
    allocate: (capacity: number) => TOut,
    grow: (filled: TOut, capacity: number) => TOut,
  ): TOut {
    let capacity = Math.floor(input.remaining() * this.#averageOutPerIn);
    let output = allocate(capacity);
    if (capacity === 0 && input.remaining() === 0) {
      output.flip();
      return output;
    }
    this.reset();
    for (;;) {
      let result = input.hasRemaining()
        ? this.step(input, output, true)
        : CoderResult.UNDERFLOW;
      if (result.isUnderflow()) {
        result = this.flush(output);
      }
      if (result.isUnderflow()) {
        break;
      }
      if (result.isOverflow()) {
        capacity = 2 * capacity + 1;
        output.flip();
        output = grow(output, capacity);
        continue;
      }
      result.throwError();
    }
    output.flip();
    return output;
  }

  #runLoop(input: TIn, output: TOut): CoderResult {
    try {
      return this.codingLoop(input, output);
    } catch (err) {
      if (
        err instanceof BufferUnderflowError ||
        err instanceof BufferOverflowError
      ) {
        throw new CoderMalfunctionError(err);
      }
      throw err;
    }
  }

  /**
   * Converts as much input as fits. Must return UNDERFLOW when it needs
   * more input, OVERFLOW when the output is full, or an error result with
   * the input positioned at the start of the offending sequence.
   */
  protected abstract codingLoop(input: TIn, output: TOut): CoderResult;

  /** Number of output units the replacement occupies. */
  protected abstract replacementLength(): number;

  protected abstract writeReplacement(output: TOut): void;

  protected implFlush(_output: TOut): CoderResult {
    return CoderResult.UNDERFLOW;
  }

  protected implReset(): void {
    // Stateless by default.
  }
}

function checkAction(action: CodingErrorAction): CodingErrorAction {
  if (!isCodingErrorAction(action)) {
    throw new TypeError(`Unknown coding error action: ${String(action)}`);
  }
  return action;
}
