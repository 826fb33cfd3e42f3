import type { ByteBuffer } from "../buffers/byte_buffer.ts";
import { CharBuffer } from "../buffers/char_buffer.ts";
import type { Charset } from "../charset/charset.ts";
import type { CharsetDecoder } from "../charset/charset_decoder.ts";
import { CoderResult } from "../charset/coder_result.ts";
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
import { CHAR_SEQUENCE } from "./output_part.ts";
import type { DecodeCase } from "./test_case.ts";

/** What a decode conformance run found. */
export interface DecodeConformanceReport {
  readonly charsetName: string;
  readonly configurations: readonly CodingConfiguration[];
  readonly mismatches: readonly ConformanceMismatch<string>[];
}

/**
 * Decodes every remaining byte of `input` in one call.
 */
export function decodeSingleShot(
  decoder: CharsetDecoder,
  input: ByteBuffer,
): string {
  return decoder.decodeAll(input).toString();
}

/**
 * Decodes `input` through repeated stepwise calls, each exposing one more
 * byte, into a fixed-size output area. Ends with a final step that signals
 * the end of input and a flush. The first error result is thrown.
 *
 * The decoder is reset first; `input` has its limit moved while running.
 */
export function decodeIncrementally(
  decoder: CharsetDecoder,
  input: ByteBuffer,
  outputCapacity: number,
): string {
  const end = input.limit();
  input.setLimit(input.position());
  const output = CharBuffer.allocate(outputCapacity);
  decoder.reset();

  let result = CoderResult.UNDERFLOW;
  while (result.isUnderflow() && input.limit() < end) {
    input.setLimit(input.limit() + 1);
    result = decoder.decodeStep(input, output, false);
  }
  if (result.isError()) {
    result.throwError();
  }
  result = decoder.decodeStep(input, output, true);
  if (result.isError()) {
    result.throwError();
  }
  result = decoder.flush(output);
  if (result.isError()) {
    result.throwError();
  }
  output.flip();
  return output.toString();
}

function newDecoder(
  charset: Charset,
  configuration: CodingConfiguration,
): CharsetDecoder {
  return charset.newDecoder()
    .onMalformedInput(configuration.malformedAction)
    .onUnmappableCharacter(configuration.unmappableAction);
}

/**
 * Runs `testCase` through `charset`'s decoder under every configuration of
 * the action matrix and collects the mismatches.
 *
 * Per configuration, the single-shot and incremental runs of one decoder
 * must agree, and a second decoder's single-shot run must match the
 * expected output folded with that decoder's replacement.
 */
export function checkDecodeConformance(
  charset: Charset,
  testCase: DecodeCase,
  options?: ConformanceOptions,
): DecodeConformanceReport {
  const { readOnlyVariants, outputCapacityFactor, logger } = resolveOptions(
    options,
  );
  const log = logger.child("decode");
  const charsetName = charset.name();
  const configurations = buildMatrix(testCase.expected, readOnlyVariants);
  const mismatches: ConformanceMismatch<string>[] = [];
  const record = (mismatch: ConformanceMismatch<string>) => {
    log.warn(mismatch.message);
    mismatches.push(mismatch);
  };

  for (const configuration of configurations) {
    log.debug(`${charsetName} ${describeConfiguration(configuration)}`);
    const { readOnly } = configuration;

    const decoder = newDecoder(charset, configuration);
    const direct = captureOutcome(() =>
      decodeSingleShot(decoder, prepareInput(testCase.input, readOnly))
    );
    const incremental = captureOutcome(() =>
      decodeIncrementally(
        decoder,
        prepareInput(testCase.input, readOnly),
        testCase.input.capacity() * outputCapacityFactor,
      )
    );
    if (!outcomesEquivalent(direct, incremental, CHAR_SEQUENCE)) {
      record(createMismatch({
        direction: "decode",
        check: "incremental",
        charsetName,
        configuration,
        expected: direct,
        actual: incremental,
      }, CHAR_SEQUENCE));
    }

    const fresh = newDecoder(charset, configuration);
    const actual = captureOutcome(() =>
      decodeSingleShot(fresh, prepareInput(testCase.input, readOnly))
    );
    const expected = foldExpectedOutput(
      testCase.expected,
      {
        malformed: configuration.malformedAction,
        unmappable: configuration.unmappableAction,
      },
      fresh.replacement(),
      CHAR_SEQUENCE,
    );
    if (!outcomesEquivalent(expected, actual, CHAR_SEQUENCE)) {
      record(createMismatch({
        direction: "decode",
        check: "expected",
        charsetName,
        configuration,
        expected,
        actual,
      }, CHAR_SEQUENCE));
    }
  }

  log.info(
    `${charsetName}: ${configurations.length} configurations, ${mismatches.length} mismatches`,
  );
  return { charsetName, configurations, mismatches };
}

/**
 * Like {@link checkDecodeConformance}, but throws a
 * ConformanceMismatchError for the first mismatch.
 */
export function assertDecodeConformance(
  charset: Charset,
  testCase: DecodeCase,
  options?: ConformanceOptions,
): void {
  const [first] = checkDecodeConformance(charset, testCase, options).mismatches;
  if (first) {
    throw new ConformanceMismatchError(first);
  }
}
