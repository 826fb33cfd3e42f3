import {
  CharacterCodingError,
  type CodingFailureKind,
} from "../charset/coding_errors.ts";
import type { UnitSequence } from "./output_part.ts";

/** A coding failure reduced to what conformance compares. */
export interface CodingFailure {
  readonly kind: CodingFailureKind;
  readonly inputLength: number;
}

/**
 * Result of one codec run: the produced units, or the coding failure that
 * ended it.
 */
export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: CodingFailure };

export function succeeded<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failed<T>(failure: CodingFailure): Outcome<T> {
  return { ok: false, failure };
}

/**
 * Runs `run` and captures its result. Coding failures become failed
 * outcomes; any other error is rethrown.
 */
export function captureOutcome<T>(run: () => T): Outcome<T> {
  try {
    return succeeded(run());
  } catch (err) {
    if (err instanceof CharacterCodingError) {
      return failed({ kind: err.kind, inputLength: err.inputLength });
    }
    throw err;
  }
}

/**
 * Two outcomes are equivalent when both produced the same units, or both
 * failed with the same kind and input length. Any other pairing is not.
 */
export function outcomesEquivalent<T>(
  a: Outcome<T>,
  b: Outcome<T>,
  sequence: UnitSequence<T>,
): boolean {
  if (a.ok && b.ok) {
    return sequence.equals(a.value, b.value);
  }
  if (!a.ok && !b.ok) {
    return a.failure.kind === b.failure.kind &&
      a.failure.inputLength === b.failure.inputLength;
  }
  return false;
}

export function describeOutcome<T>(
  outcome: Outcome<T>,
  sequence: UnitSequence<T>,
): string {
  if (outcome.ok) {
    return `success ${sequence.describe(outcome.value)}`;
  }
  const { kind, inputLength } = outcome.failure;
  return `${kind} failure (inputLength=${inputLength})`;
}
