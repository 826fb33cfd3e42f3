import type { CharBuffer } from "../buffers/char_buffer.ts";
import type { Charset } from "../charset/charset.ts";
import type { CharsetEncoder } from "../charset/charset_encoder.ts";
import { type ConformanceOptions, resolveOptions } from "../config.ts";
import {
  buildMatrix,
  type CodingConfiguration,
  describeConfiguration,
} from "./action_matrix.ts";
import {
  type ConformanceMismatch,
  ConformanceMismatchError,
  createMismatch,
} from "./conformance_error.ts";
import { foldExpectedOutput } from "./expected_output.ts";
import { prepareInput } from "./input_view.ts";
import { captureOutcome, outcomesEquivalent } from "./outcome.ts";
import { BYTE_SEQUENCE } from "./output_part.ts";
import type { EncodeCase } from "./test_case.ts";

/** What an encode conformance run found. */
export interface EncodeConformanceReport {
  readonly charsetName: string;
  readonly configurations: readonly CodingConfiguration[];
  readonly mismatches: readonly ConformanceMismatch<Uint8Array>[];
}

export function encodeSingleShot(
  encoder: CharsetEncoder,
  input: CharBuffer,
): Uint8Array {
  return encoder.encodeAll(input).toUint8Array();
}

/**
 * Runs `testCase` through `charset`'s encoder under every configuration of
 * the action matrix. Only the single-shot run is checked, against the
 * expected output folded with the encoder's replacement.
 */
export function checkEncodeConformance(
  charset: Charset,
  testCase: EncodeCase,
  options?: ConformanceOptions,
): EncodeConformanceReport {
  const { readOnlyVariants, logger } = resolveOptions(options);
  const log = logger.child("encode");
  const charsetName = charset.name();
  const configurations = buildMatrix(testCase.expected, readOnlyVariants);
  const mismatches: ConformanceMismatch<Uint8Array>[] = [];

  for (const configuration of configurations) {
    log.debug(`${charsetName} ${describeConfiguration(configuration)}`);
    const encoder = charset.newEncoder()
      .onMalformedInput(configuration.malformedAction)
      .onUnmappableCharacter(configuration.unmappableAction);

    const actual = captureOutcome(() =>
      encodeSingleShot(
        encoder,
        prepareInput(testCase.input, configuration.readOnly),
      )
    );
    const expected = foldExpectedOutput(
      testCase.expected,
      {
        malformed: configuration.malformedAction,
        unmappable: configuration.unmappableAction,
      },
      encoder.replacement(),
      BYTE_SEQUENCE,
    );
    if (!outcomesEquivalent(expected, actual, BYTE_SEQUENCE)) {
      const mismatch = createMismatch({
        direction: "encode",
        check: "expected",
        charsetName,
        configuration,
        expected,
        actual,
      }, BYTE_SEQUENCE);
      log.warn(mismatch.message);
      mismatches.push(mismatch);
    }
  }

  log.info(
    `${charsetName}: ${configurations.length} configurations, ${mismatches.length} mismatches`,
  );
  return { charsetName, configurations, mismatches };
}

export function assertEncodeConformance(
  charset: Charset,
  testCase: EncodeCase,
  options?: ConformanceOptions,
): void {
  const [first] = checkEncodeConformance(charset, testCase, options).mismatches;
  if (first) {
    throw new ConformanceMismatchError(first);
  }
}
