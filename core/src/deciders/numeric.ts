/**
 * Culture-aware readers for integer and decimal text.
 *
 * Both readers report the digit counts a column needs alongside the value,
 * so a decider can accept and size a candidate in one pass.
 */

import { MAX_DECIMAL_DIGITS } from '../constants.js';
import type { CultureConfig } from '../culture.js';
import { escapeRegExp } from './date-formats.js';

export interface IntegerReading {
  value: number;
  /** Significant digits of |value|; zero counts as one digit */
  integerDigits: number;
}

export interface DecimalReading {
  value: number;
  /** Digits before the point once the exponent is applied, leading zeros dropped */
  integerDigits: number;
  /** Digits after the point, trailing zeros kept */
  fractionalDigits: number;
}

interface NumberPatterns {
  integer: RegExp;
  decimal: RegExp;
  groupSeparator: RegExp | undefined;
}

const patternCache = new WeakMap<CultureConfig, NumberPatterns>();

function patternsFor(culture: CultureConfig): NumberPatterns {
  let patterns = patternCache.get(culture);
  if (patterns) return patterns;

  const separators = culture.groupSeparators.map(escapeRegExp).join('|');
  const integerPart = separators ? `(?:\\d+|\\d{1,3}(?:(?:${separators})\\d{3})+)` : '\\d+';
  const point = escapeRegExp(culture.decimalSeparator);

  patterns = {
    integer: new RegExp(`^([+-])?(${integerPart})$`),
    decimal: new RegExp(`^([+-])?(${integerPart})?(?:${point}(\\d*))?(?:[eE]([+-]?\\d+))?$`),
    groupSeparator: separators ? new RegExp(separators, 'g') : undefined,
  };
  patternCache.set(culture, patterns);
  return patterns;
}

function stripGroups(digits: string, patterns: NumberPatterns): string {
  return patterns.groupSeparator ? digits.replace(patterns.groupSeparator, '') : digits;
}

/**
 * Count the decimal digits of a non-negative integer without building a string.
 */
export function countDigits(value: number | bigint): number {
  if (typeof value === 'bigint') {
    let n = value < 0n ? -value : value;
    let digits = 1;
    while (n >= 10n) {
      n /= 10n;
      digits++;
    }
    return digits;
  }
  let n = Math.abs(value);
  let digits = 1;
  while (n >= 10) {
    n = Math.floor(n / 10);
    digits++;
  }
  return digits;
}

/**
 * Read a whole number within the safe-integer range.
 */
export function readInteger(text: string, culture: CultureConfig): IntegerReading | undefined {
  const patterns = patternsFor(culture);
  const m = patterns.integer.exec(text);
  if (!m) return undefined;

  const magnitude = Number(stripGroups(m[2], patterns));
  if (!Number.isSafeInteger(magnitude)) return undefined;

  return {
    value: m[1] === '-' && magnitude !== 0 ? -magnitude : magnitude,
    integerDigits: countDigits(magnitude),
  };
}

/**
 * True when `text` has the shape of a decimal number, however many digits it
 * carries.
 */
export function isDecimalText(text: string, culture: CultureConfig): boolean {
  const m = patternsFor(culture).decimal.exec(text);
  return m !== null && (m[2] !== undefined || (m[3] ?? '').length > 0);
}

function countLeadingZeros(digits: string): number {
  let zeros = 0;
  while (zeros < digits.length && digits.charCodeAt(zeros) === 0x30) zeros++;
  return zeros;
}

/**
 * Read a decimal number, optionally in exponent notation. Numbers needing
 * more than MAX_DECIMAL_DIGITS digits once the exponent is applied are
 * rejected.
 */
export function readDecimal(text: string, culture: CultureConfig): DecimalReading | undefined {
  const patterns = patternsFor(culture);
  const m = patterns.decimal.exec(text);
  if (!m) return undefined;

  const wholeDigits = m[2] === undefined ? '' : stripGroups(m[2], patterns);
  const fractionDigits = m[3] ?? '';
  if (wholeDigits.length === 0 && fractionDigits.length === 0) return undefined;

  // shift the decimal point by the exponent and count either side of it
  const exponent = m[4] === undefined ? 0 : Number(m[4]);
  const digitCount = wholeDigits.length + fractionDigits.length;
  const point = wholeDigits.length + exponent;
  const leadingZeros = countLeadingZeros(wholeDigits + fractionDigits);
  const integerDigits = leadingZeros === digitCount ? 0 : Math.max(0, point - leadingZeros);
  const fractionalDigits = point >= digitCount ? 0 : digitCount - point;
  if (integerDigits + fractionalDigits > MAX_DECIMAL_DIGITS) return undefined;

  const sign = m[1] === '-' ? '-' : '';
  const value = Number(`${sign}${wholeDigits || '0'}.${fractionDigits || '0'}e${exponent}`);
  if (!Number.isFinite(value)) return undefined;

  return { value: value === 0 ? 0 : value, integerDigits, fractionalDigits };
}
