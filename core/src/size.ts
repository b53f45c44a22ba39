/**
 * Size tracking for inferred columns.
 *
 * A Size is an immutable value. Every operation here is monotonic: each
 * field of the result is at least the matching field of every input, so
 * sizes can be accreted in any order and still agree. Operations hand back
 * the input object itself when it already covers the request, which keeps
 * the steady state of a long column free of allocation.
 *
 * @module size
 */

export interface Size {
  /** Digits before the decimal point (sign excluded) */
  readonly integerDigits: number;
  /** Digits after the decimal point */
  readonly fractionalDigits: number;
  /** Longest text rendering observed, in characters */
  readonly stringLength: number;
}

export const EMPTY_SIZE: Size = Object.freeze({
  integerDigits: 0,
  fractionalDigits: 0,
  stringLength: 0,
});

function clamp(n: number): number {
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

/**
 * Create a size; negative or non-finite inputs become 0.
 */
export function createSize(integerDigits = 0, fractionalDigits = 0, stringLength = 0): Size {
  return {
    integerDigits: clamp(integerDigits),
    fractionalDigits: clamp(fractionalDigits),
    stringLength: clamp(stringLength),
  };
}

/**
 * True when every field of `a` is at least the matching field of `b`.
 */
export function covers(a: Size, b: Size): boolean {
  return (
    a.integerDigits >= b.integerDigits &&
    a.fractionalDigits >= b.fractionalDigits &&
    a.stringLength >= b.stringLength
  );
}

export function growNumeric(size: Size, integerDigits: number, fractionalDigits: number): Size {
  if (size.integerDigits >= integerDigits && size.fractionalDigits >= fractionalDigits) {
    return size;
  }
  return {
    integerDigits: Math.max(size.integerDigits, clamp(integerDigits)),
    fractionalDigits: Math.max(size.fractionalDigits, clamp(fractionalDigits)),
    stringLength: size.stringLength,
  };
}

export function growLength(size: Size, length: number): Size {
  if (size.stringLength >= length) {
    return size;
  }
  return {
    integerDigits: size.integerDigits,
    fractionalDigits: size.fractionalDigits,
    stringLength: clamp(length),
  };
}

/**
 * Component-wise maximum. Commutative and associative.
 */
export function combineSizes(a: Size, b: Size): Size {
  if (covers(a, b)) return a;
  if (covers(b, a)) return b;
  return {
    integerDigits: Math.max(a.integerDigits, b.integerDigits),
    fractionalDigits: Math.max(a.fractionalDigits, b.fractionalDigits),
    stringLength: Math.max(a.stringLength, b.stringLength),
  };
}

export function sizesEqual(a: Size, b: Size): boolean {
  return (
    a.integerDigits === b.integerDigits &&
    a.fractionalDigits === b.fractionalDigits &&
    a.stringLength === b.stringLength
  );
}

export function isEmptySize(size: Size): boolean {
  return size.integerDigits === 0 && size.fractionalDigits === 0 && size.stringLength === 0;
}

/** Total significant digits, as in decimal(precision, scale) */
export function precisionOf(size: Size): number {
  return size.integerDigits + size.fractionalDigits;
}

export function scaleOf(size: Size): number {
  return size.fractionalDigits;
}

/**
 * Characters needed to print the widest number the digit counts allow,
 * including the decimal point. The sign is tracked by stringLength.
 */
export function decimalStringLength(size: Size): number {
  if (size.integerDigits === 0 && size.fractionalDigits === 0) {
    return 0;
  }
  return size.integerDigits + size.fractionalDigits + (size.fractionalDigits > 0 ? 1 : 0);
}
