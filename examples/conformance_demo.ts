// Example: check a custom charset against hand-written fixtures and log the
// summaries at info level.
import { CharsetRegistry } from "../src/charset/charset_registry.ts";
import { checkDecodeConformance } from "../src/conformance/decode_conformance.ts";
import { checkEncodeConformance } from "../src/conformance/encode_conformance.ts";
import {
  bytes,
  chars,
  expectBytes,
  expectChars,
} from "../src/conformance/fixtures.ts";
import { malformed } from "../src/conformance/output_part.ts";
import { decodeCase, encodeCase } from "../src/conformance/test_case.ts";
import { createLogger } from "../src/logger.ts";
import { UTF_16BE } from "./utf16be_charset.ts";

const registry = new CharsetRegistry();
registry.register(UTF_16BE);
const charset = registry.forName("utf-16be");

const logger = createLogger("demo", { threshold: "info" });

const decodeReport = checkDecodeConformance(
  charset,
  decodeCase(bytes`00 41 d8 3d 00 42`, ...expectChars`A${malformed(2)}B`),
  { logger },
);
const encodeReport = checkEncodeConformance(
  charset,
  encodeCase(chars`A\uDC00`, ...expectBytes`00 41 ${malformed(1)}`),
  { logger },
);

export const mismatchCount = decodeReport.mismatches.length +
  encodeReport.mismatches.length;
