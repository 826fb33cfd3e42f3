import { describe, expect, it } from "vitest";
import { CoderResult } from "../coder_result.ts";
import {
  CoderStateError,
  MalformedInputError,
  UnmappableCharacterError,
} from "../coding_errors.ts";
import { BufferOverflowError } from "../../buffers/buffer_error.ts";

describe("CoderResult", () => {
  it("caches error results per length", () => {
    expect(CoderResult.malformedForLength(2)).toBe(
      CoderResult.malformedForLength(2),
    );
    expect(CoderResult.malformedForLength(2)).not.toBe(
      CoderResult.unmappableForLength(2),
    );
  });

  it("classifies results", () => {
    const malformed = CoderResult.malformedForLength(1);

    expect(CoderResult.UNDERFLOW.isUnderflow()).toBe(true);
    expect(CoderResult.UNDERFLOW.isError()).toBe(false);
    expect(CoderResult.OVERFLOW.isOverflow()).toBe(true);
    expect(malformed.isError()).toBe(true);
    expect(malformed.isMalformed()).toBe(true);
    expect(malformed.isUnmappable()).toBe(false);
    expect(CoderResult.unmappableForLength(3).length()).toBe(3);
  });

  it("only gives error results a length", () => {
    expect(() => CoderResult.OVERFLOW.length()).toThrow(CoderStateError);
    expect(() => CoderResult.OVERFLOW.length()).toThrow(
      "Cannot read the length of in state overflow",
    );
  });

  it("rejects non-positive lengths", () => {
    expect(() => CoderResult.malformedForLength(0)).toThrow(RangeError);
    expect(() => CoderResult.unmappableForLength(1.5)).toThrow(RangeError);
  });

  it("throws the matching error", () => {
    expect(() => CoderResult.malformedForLength(2).throwError()).toThrow(
      MalformedInputError,
    );
    expect(() => CoderResult.unmappableForLength(1).throwError()).toThrow(
      UnmappableCharacterError,
    );
    expect(() => CoderResult.OVERFLOW.throwError()).toThrow(
      BufferOverflowError,
    );

    try {
      CoderResult.unmappableForLength(4).throwError();
    } catch (err) {
      expect(err).toBeInstanceOf(UnmappableCharacterError);
      expect(err).toMatchObject({ kind: "unmappable", inputLength: 4 });
    }
  });

  it("renders for diagnostics", () => {
    expect(CoderResult.UNDERFLOW.toString()).toBe("UNDERFLOW");
    expect(CoderResult.malformedForLength(1).toString()).toBe("MALFORMED[1]");
    expect(CoderResult.unmappableForLength(2).toString()).toBe(
      "UNMAPPABLE[2]",
    );
  });
});
