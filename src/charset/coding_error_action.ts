/**
 * What a codec does when it meets malformed input or an unmappable
 * character.
 */
export const CodingErrorAction = {
  /** Drop the offending input and carry on. */
  IGNORE: "IGNORE",
  /** Write the codec's replacement and carry on. */
  REPLACE: "REPLACE",
  /** Stop and return the error result. */
  REPORT: "REPORT",
} as const;

export type CodingErrorAction =
  typeof CodingErrorAction[keyof typeof CodingErrorAction];

/** Every action, in the order the conformance matrix visits them. */
export const ALL_ERROR_ACTIONS: readonly CodingErrorAction[] = [
  CodingErrorAction.IGNORE,
  CodingErrorAction.REPLACE,
  CodingErrorAction.REPORT,
];

export function isCodingErrorAction(value: unknown): value is CodingErrorAction {
  return value === CodingErrorAction.IGNORE ||
    value === CodingErrorAction.REPLACE ||
    value === CodingErrorAction.REPORT;
}
