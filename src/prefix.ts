const MAX_CODE_POINT = 0x10ffff;
const SURROGATE_START = 0xd800;
const SURROGATE_END = 0xdfff;

export interface PrefixBounds {
  lower: string;
  /** Exclusive upper bound; null when the last code point has no successor. */
  upper: string | null;
  /** Prefix length in code points, for the substr() check on an open range. */
  length: number;
}

/**
 * Range [lower, upper) holding exactly the strings that start with `prefix`,
 * under code point ordering. Returns null for the empty prefix (no predicate).
 */
export function prefixBounds(prefix: string): PrefixBounds | null {
  const codePoints = Array.from(prefix);
  const last = codePoints.pop();
  if (last === undefined) {
    return null;
  }

  const length = codePoints.length + 1;
  const lastCodePoint = last.codePointAt(0) ?? 0;
  if (lastCodePoint === MAX_CODE_POINT) {
    return { lower: prefix, upper: null, length };
  }

  let next = lastCodePoint + 1;
  if (next === SURROGATE_START) {
    next = SURROGATE_END + 1;
  }

  return {
    lower: prefix,
    upper: codePoints.join('') + String.fromCodePoint(next),
    length
  };
}
