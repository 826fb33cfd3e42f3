/**
 * Errors raised by the conformance checks.
 */

import {
  type CodingConfiguration,
  describeConfiguration,
} from "./action_matrix.ts";
import { describeOutcome, type Outcome } from "./outcome.ts";
import type { UnitSequence } from "./output_part.ts";

export type ConformanceDirection = "decode" | "encode";

/**
 * `incremental`: the stepwise run disagreed with the single-shot run.
 * `expected`: the single-shot run disagreed with the expected output.
 */
export type ConformanceCheck = "incremental" | "expected";

/**
 * A disagreement found by a conformance check. For `incremental` checks
 * `expected` holds the single-shot outcome and `actual` the incremental one;
 * for `expected` checks they hold the folded expected outcome and the
 * single-shot one.
 */
export interface ConformanceMismatch<T> {
  readonly direction: ConformanceDirection;
  readonly check: ConformanceCheck;
  readonly charsetName: string;
  readonly configuration: CodingConfiguration;
  readonly expected: Outcome<T>;
  readonly actual: Outcome<T>;
  /** Both outcomes and the configuration, rendered for humans. */
  readonly message: string;
}

export function createMismatch<T>(
  fields: Omit<ConformanceMismatch<T>, "message">,
  sequence: UnitSequence<T>,
): ConformanceMismatch<T> {
  const [expectedLabel, actualLabel] = fields.check === "incremental"
    ? ["single-shot", "incremental"]
    : ["expected", "single-shot"];
  const message = `${fields.direction} ${fields.charsetName} ` +
    `[${describeConfiguration(fields.configuration)}]: ` +
    `${expectedLabel}: ${describeOutcome(fields.expected, sequence)}; ` +
    `${actualLabel}: ${describeOutcome(fields.actual, sequence)}`;
  return {
    direction: fields.direction,
    check: fields.check,
    charsetName: fields.charsetName,
    configuration: fields.configuration,
    expected: fields.expected,
    actual: fields.actual,
    message,
  };
}

/**
 * Thrown by the asserting conformance checks on the first mismatch.
 */
export class ConformanceMismatchError extends Error {
  public readonly mismatch: ConformanceMismatch<unknown>;

  constructor(mismatch: ConformanceMismatch<unknown>) {
    super(mismatch.message);
    this.name = "ConformanceMismatchError";
    this.mismatch = mismatch;
  }
}

/**
 * The harness could not prepare an input view with the requested
 * mutability.
 */
export class ConformanceSetupError extends Error {
  public readonly readOnly: boolean;

  constructor(readOnly: boolean) {
    super(
      `Prepared input view does not match the requested readOnly=${readOnly}`,
    );
    this.name = "ConformanceSetupError";
    this.readOnly = readOnly;
  }
}
