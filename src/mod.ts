// Buffers
export type { CodeUnitArray } from "./buffers/code_unit_buffer.ts";
export { CodeUnitBuffer } from "./buffers/code_unit_buffer.ts";
export { ByteBuffer } from "./buffers/byte_buffer.ts";
export { CharBuffer } from "./buffers/char_buffer.ts";
export {
  BufferOverflowError,
  BufferUnderflowError,
  InvalidMarkError,
  ReadOnlyBufferError,
} from "./buffers/buffer_error.ts";

// Codec framework
export { Charset, checkCharsetName } from "./charset/charset.ts";
export type { CoderBuffer, CoderState } from "./charset/charset_coder.ts";
export { CharsetCoder } from "./charset/charset_coder.ts";
export { CharsetDecoder } from "./charset/charset_decoder.ts";
export { CharsetEncoder } from "./charset/charset_encoder.ts";
export { CoderResult } from "./charset/coder_result.ts";
export {
  ALL_ERROR_ACTIONS,
  CodingErrorAction,
  isCodingErrorAction,
} from "./charset/coding_error_action.ts";
export type { CodingFailureKind } from "./charset/coding_errors.ts";
export {
  CharacterCodingError,
  CoderMalfunctionError,
  CoderStateError,
  MalformedInputError,
  UnmappableCharacterError,
} from "./charset/coding_errors.ts";
export {
  CharsetRegistrationError,
  IllegalCharsetNameError,
  UnsupportedCharsetError,
} from "./charset/charset_errors.ts";
export { CharsetRegistry, charsets } from "./charset/charset_registry.ts";

// Reference codecs
export {
  ISO_8859_1,
  Latin1FamilyCharset,
  US_ASCII,
} from "./charset/latin1_family.ts";
export { UTF_8, Utf8Charset } from "./charset/utf8.ts";

// Conformance
export type {
  ByteOutputPart,
  CharOutputPart,
  ErrorPart,
  LiteralPart,
  MalformedPart,
  OutputPart,
  UnitSequence,
  UnmappablePart,
} from "./conformance/output_part.ts";
export {
  BYTE_SEQUENCE,
  CHAR_SEQUENCE,
  isOutputPart,
  literal,
  malformed,
  unmappable,
} from "./conformance/output_part.ts";
export type { CodingFailure, Outcome } from "./conformance/outcome.ts";
export {
  captureOutcome,
  describeOutcome,
  outcomesEquivalent,
} from "./conformance/outcome.ts";
export type { ErrorActions } from "./conformance/expected_output.ts";
export { foldExpectedOutput } from "./conformance/expected_output.ts";
export type { CodingConfiguration } from "./conformance/action_matrix.ts";
export {
  actionsFor,
  buildMatrix,
  describeConfiguration,
} from "./conformance/action_matrix.ts";
export type {
  ConformanceCheck,
  ConformanceDirection,
  ConformanceMismatch,
} from "./conformance/conformance_error.ts";
export {
  ConformanceMismatchError,
  ConformanceSetupError,
} from "./conformance/conformance_error.ts";
export type { ViewableBuffer } from "./conformance/input_view.ts";
export { prepareInput } from "./conformance/input_view.ts";
export type { DecodeCase, EncodeCase } from "./conformance/test_case.ts";
export { decodeCase, encodeCase } from "./conformance/test_case.ts";
export type { ByteFragment, CharFragment } from "./conformance/fixtures.ts";
export {
  bytes,
  chars,
  expectBytes,
  expectChars,
  FixtureSyntaxError,
} from "./conformance/fixtures.ts";
export type { DecodeConformanceReport } from "./conformance/decode_conformance.ts";
export {
  assertDecodeConformance,
  checkDecodeConformance,
  decodeIncrementally,
  decodeSingleShot,
} from "./conformance/decode_conformance.ts";
export type { EncodeConformanceReport } from "./conformance/encode_conformance.ts";
export {
  assertEncodeConformance,
  checkEncodeConformance,
  encodeSingleShot,
} from "./conformance/encode_conformance.ts";
export { CharsetConformance } from "./conformance/charset_conformance.ts";

// Configuration and logging
export type { ConformanceOptions } from "./config.ts";
export {
  DEFAULT_OPTIONS,
  getDefaultLogger,
  LOG_LEVEL_ENV,
  loadLogThreshold,
  resolveOptions,
} from "./config.ts";
export type {
  Logger,
  LoggerOptions,
  LogLevel,
  LogSink,
  LogThreshold,
} from "./logger.ts";
export { consoleSink, createLogger, isLogThreshold } from "./logger.ts";
