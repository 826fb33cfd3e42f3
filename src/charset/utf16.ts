/**
 * UTF-16 code unit helpers used by the charset codecs.
 */

export function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

export function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

export function toCodePoint(high: number, low: number): number {
  return ((high - 0xd800) << 10) + (low - 0xdc00) + 0x10000;
}

export function highSurrogateOf(codePoint: number): number {
  return 0xd800 + ((codePoint - 0x10000) >> 10);
}

export function lowSurrogateOf(codePoint: number): number {
  return 0xdc00 + ((codePoint - 0x10000) & 0x3ff);
}
