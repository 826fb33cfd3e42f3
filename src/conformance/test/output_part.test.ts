import { describe, expect, it } from "vitest";
import {
  BYTE_SEQUENCE,
  CHAR_SEQUENCE,
  isOutputPart,
  literal,
  malformed,
  unmappable,
} from "../output_part.ts";

describe("output parts", () => {
  it("builds frozen tagged parts", () => {
    expect(literal("ab")).toEqual({ kind: "literal", units: "ab" });
    expect(malformed(2)).toEqual({ kind: "malformed", length: 2 });
    expect(unmappable(1)).toEqual({ kind: "unmappable", length: 1 });
    expect(Object.isFrozen(malformed(1))).toBe(true);
  });

  it("rejects lengths that are not positive integers", () => {
    expect(() => malformed(0)).toThrow(
      "Error part length must be a positive integer. Got 0",
    );
    expect(() => unmappable(1.5)).toThrow(RangeError);
    expect(() => unmappable(-1)).toThrow(RangeError);
  });

  it("recognises parts", () => {
    expect(isOutputPart(literal(new Uint8Array([1])))).toBe(true);
    expect(isOutputPart(unmappable(3))).toBe(true);
    expect(isOutputPart({ kind: "literal" })).toBe(false);
    expect(isOutputPart({ kind: "malformed", length: "1" })).toBe(false);
    expect(isOutputPart({ kind: "other", length: 1 })).toBe(false);
    expect(isOutputPart(new Uint8Array([1]))).toBe(false);
    expect(isOutputPart("literal")).toBe(false);
    expect(isOutputPart(null)).toBe(false);
  });
});

describe("unit sequences", () => {
  it("concatenates and compares bytes", () => {
    const joined = BYTE_SEQUENCE.concat([
      new Uint8Array([1]),
      BYTE_SEQUENCE.empty(),
      new Uint8Array([2, 3]),
    ]);

    expect(joined).toEqual(new Uint8Array([1, 2, 3]));
    expect(BYTE_SEQUENCE.length(joined)).toBe(3);
    expect(BYTE_SEQUENCE.equals(joined, new Uint8Array([1, 2, 3]))).toBe(true);
    expect(BYTE_SEQUENCE.equals(joined, new Uint8Array([1, 2]))).toBe(false);
    expect(BYTE_SEQUENCE.equals(joined, new Uint8Array([1, 2, 4]))).toBe(false);
  });

  it("describes bytes as hex", () => {
    expect(BYTE_SEQUENCE.describe(new Uint8Array([0x41, 0xff, 0x0a]))).toBe(
      "[41 ff 0a]",
    );
    expect(BYTE_SEQUENCE.describe(new Uint8Array(0))).toBe("[]");
  });

  it("describes text as a quoted string", () => {
    expect(CHAR_SEQUENCE.describe('say "hi"')).toBe('"say \\"hi\\""');
    expect(CHAR_SEQUENCE.concat(["a", "", "b"])).toBe("ab");
    expect(CHAR_SEQUENCE.equals("a", "a")).toBe(true);
  });
});
