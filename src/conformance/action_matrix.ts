import {
  ALL_ERROR_ACTIONS,
  CodingErrorAction,
} from "../charset/coding_error_action.ts";
import type { ErrorPart, OutputPart } from "./output_part.ts";

/** One cell of the conformance matrix. */
export interface CodingConfiguration {
  readonly malformedAction: CodingErrorAction;
  readonly unmappableAction: CodingErrorAction;
  /** Whether the input is handed to the codec as a read-only view. */
  readonly readOnly: boolean;
}

const REPORT_ONLY: readonly CodingErrorAction[] = [CodingErrorAction.REPORT];

/**
 * Actions worth exercising for one error kind: all of them when the
 * expected output mentions that kind, otherwise REPORT alone.
 */
export function actionsFor<T>(
  parts: readonly OutputPart<T>[],
  kind: ErrorPart["kind"],
): readonly CodingErrorAction[] {
  return parts.some((part) => part.kind === kind)
    ? ALL_ERROR_ACTIONS
    : REPORT_ONLY;
}

/**
 * Every configuration to check for `parts`, nested malformed action, then
 * unmappable action, then mutability.
 */
export function buildMatrix<T>(
  parts: readonly OutputPart<T>[],
  readOnlyVariants: readonly boolean[],
): CodingConfiguration[] {
  const matrix: CodingConfiguration[] = [];
  for (const malformedAction of actionsFor(parts, "malformed")) {
    for (const unmappableAction of actionsFor(parts, "unmappable")) {
      for (const readOnly of readOnlyVariants) {
        matrix.push({ malformedAction, unmappableAction, readOnly });
      }
    }
  }
  return matrix;
}

export function describeConfiguration(
  configuration: CodingConfiguration,
): string {
  return `malformed=${configuration.malformedAction}, ` +
    `unmappable=${configuration.unmappableAction}, ` +
    `readOnly=${configuration.readOnly}`;
}
