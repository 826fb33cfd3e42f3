import { CodingErrorAction } from "../charset/coding_error_action.ts";
import { type CodingFailure, failed, type Outcome, succeeded } from "./outcome.ts";
import type { OutputPart, UnitSequence } from "./output_part.ts";

/** The pair of error actions a codec is configured with. */
export interface ErrorActions {
  readonly malformed: CodingErrorAction;
  readonly unmappable: CodingErrorAction;
}

/**
 * Folds expected output parts into the outcome a codec configured with
 * `actions` must produce.
 *
 * Literals are concatenated. Error parts contribute nothing under IGNORE,
 * `replacement` under REPLACE, and under REPORT end the fold with a failure
 * carrying the part's length; parts after it are not looked at.
 */
export function foldExpectedOutput<T>(
  parts: readonly OutputPart<T>[],
  actions: ErrorActions,
  replacement: T,
  sequence: UnitSequence<T>,
): Outcome<T> {
  const chunks: T[] = [];
  for (const part of parts) {
    const expanded = expandPart(part, actions, replacement, sequence);
    if (!expanded.ok) {
      return expanded;
    }
    chunks.push(expanded.value);
  }
  return succeeded(sequence.concat(chunks));
}

function expandPart<T>(
  part: OutputPart<T>,
  actions: ErrorActions,
  replacement: T,
  sequence: UnitSequence<T>,
): Outcome<T> {
  switch (part.kind) {
    case "literal":
      return succeeded(part.units);
    case "malformed":
      return applyAction(
        actions.malformed,
        { kind: "malformed", inputLength: part.length },
        replacement,
        sequence,
      );
    case "unmappable":
      return applyAction(
        actions.unmappable,
        { kind: "unmappable", inputLength: part.length },
        replacement,
        sequence,
      );
  }
}

function applyAction<T>(
  action: CodingErrorAction,
  failure: CodingFailure,
  replacement: T,
  sequence: UnitSequence<T>,
): Outcome<T> {
  switch (action) {
    case CodingErrorAction.IGNORE:
      return succeeded(sequence.empty());
    case CodingErrorAction.REPLACE:
      return succeeded(replacement);
    case CodingErrorAction.REPORT:
      return failed(failure);
  }
}
