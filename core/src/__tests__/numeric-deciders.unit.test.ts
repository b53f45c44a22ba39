/**
 * @coltype/core - Integer and Decimal deciders and their readers
 */

import { describe, it, expect } from 'vitest';
import { DE_DE_CULTURE, FR_FR_CULTURE, INVARIANT_CULTURE } from '../culture.js';
import { DecimalDecider } from '../deciders/decimal.js';
import { IntegerDecider } from '../deciders/integer.js';
import { countDigits, isDecimalText, readDecimal, readInteger } from '../deciders/numeric.js';
import { ParseFailureError, UnsupportedTypeError } from '../errors.js';
import { createGuessSettings } from '../settings.js';
import { EMPTY_SIZE, createSize } from '../size.js';

const settings = createGuessSettings();
const german = createGuessSettings({ culture: DE_DE_CULTURE });

// =============================================================================
// Readers
// =============================================================================

describe('countDigits', () => {
  it('should count digits of numbers and bigints', () => {
    expect(countDigits(0)).toBe(1);
    expect(countDigits(9)).toBe(1);
    expect(countDigits(10)).toBe(2);
    expect(countDigits(-12345)).toBe(5);
    expect(countDigits(12345678901234567890n)).toBe(20);
    expect(countDigits(-100n)).toBe(3);
  });
});

describe('readInteger', () => {
  it('should read signs and group separators', () => {
    expect(readInteger('-42', INVARIANT_CULTURE)).toEqual({ value: -42, integerDigits: 2 });
    expect(readInteger('+7', INVARIANT_CULTURE)).toEqual({ value: 7, integerDigits: 1 });
    expect(readInteger('1,234,567', INVARIANT_CULTURE)).toEqual({ value: 1234567, integerDigits: 7 });
    expect(readInteger('1.234', DE_DE_CULTURE)).toEqual({ value: 1234, integerDigits: 4 });
    expect(readInteger('1 234', FR_FR_CULTURE)).toEqual({ value: 1234, integerDigits: 4 });
  });

  it('should not count leading zeros', () => {
    expect(readInteger('007', INVARIANT_CULTURE)).toEqual({ value: 7, integerDigits: 1 });
  });

  it('should read negative zero as zero', () => {
    expect(Object.is(readInteger('-0', INVARIANT_CULTURE)?.value, 0)).toBe(true);
  });

  it('should reject misplaced separators and unsafe magnitudes', () => {
    expect(readInteger('1,23', INVARIANT_CULTURE)).toBeUndefined();
    expect(readInteger('1.5', INVARIANT_CULTURE)).toBeUndefined();
    expect(readInteger('9007199254740993', INVARIANT_CULTURE)).toBeUndefined();
    expect(readInteger('12a', INVARIANT_CULTURE)).toBeUndefined();
  });
});

describe('readDecimal', () => {
  it('should count digits on both sides of the point', () => {
    expect(readDecimal('3.14', INVARIANT_CULTURE)).toEqual({ value: 3.14, integerDigits: 1, fractionalDigits: 2 });
    expect(readDecimal('-0.5', INVARIANT_CULTURE)).toEqual({ value: -0.5, integerDigits: 0, fractionalDigits: 1 });
    expect(readDecimal('.5', INVARIANT_CULTURE)).toEqual({ value: 0.5, integerDigits: 0, fractionalDigits: 1 });
  });

  it('should keep trailing fractional zeros', () => {
    expect(readDecimal('1.50', INVARIANT_CULTURE)).toEqual({ value: 1.5, integerDigits: 1, fractionalDigits: 2 });
  });

  it('should apply the exponent before counting', () => {
    expect(readDecimal('1.5e3', INVARIANT_CULTURE)).toEqual({ value: 1500, integerDigits: 4, fractionalDigits: 0 });
    expect(readDecimal('1e-3', INVARIANT_CULTURE)).toEqual({ value: 0.001, integerDigits: 0, fractionalDigits: 3 });
    expect(readDecimal('12.5E-1', INVARIANT_CULTURE)).toEqual({ value: 1.25, integerDigits: 1, fractionalDigits: 2 });
  });

  it('should use the culture separators', () => {
    expect(readDecimal('1.234,5', DE_DE_CULTURE)).toEqual({ value: 1234.5, integerDigits: 4, fractionalDigits: 1 });
    expect(readDecimal('1,5', INVARIANT_CULTURE)).toBeUndefined();
  });

  it('should reject text without digits or with huge exponents', () => {
    expect(readDecimal('.', INVARIANT_CULTURE)).toBeUndefined();
    expect(readDecimal('e5', INVARIANT_CULTURE)).toBeUndefined();
    expect(readDecimal('1e401', INVARIANT_CULTURE)).toBeUndefined();
    expect(readDecimal('1e400', INVARIANT_CULTURE)).toBeUndefined();
  });

  it('should reject numbers needing more than 38 digits', () => {
    expect(readDecimal('1e37', INVARIANT_CULTURE)).toEqual({ value: 1e37, integerDigits: 38, fractionalDigits: 0 });
    expect(readDecimal('1e-38', INVARIANT_CULTURE)).toEqual({ value: 1e-38, integerDigits: 0, fractionalDigits: 38 });
    expect(readDecimal('1e38', INVARIANT_CULTURE)).toBeUndefined();
    expect(readDecimal('1e300', INVARIANT_CULTURE)).toBeUndefined();
    expect(readDecimal('1e-300', INVARIANT_CULTURE)).toBeUndefined();
  });

  it('should not count zeros shifted by the exponent', () => {
    expect(readDecimal('0e500', INVARIANT_CULTURE)).toEqual({ value: 0, integerDigits: 0, fractionalDigits: 0 });
  });
});

describe('isDecimalText', () => {
  it('should match the decimal shape regardless of size', () => {
    expect(isDecimalText('1e300', INVARIANT_CULTURE)).toBe(true);
    expect(isDecimalText('-12.5', INVARIANT_CULTURE)).toBe(true);
    expect(isDecimalText('.', INVARIANT_CULTURE)).toBe(false);
    expect(isDecimalText('1e', INVARIANT_CULTURE)).toBe(false);
    expect(isDecimalText('abc', INVARIANT_CULTURE)).toBe(false);
  });
});

// =============================================================================
// IntegerDecider
// =============================================================================

describe('IntegerDecider', () => {
  const decider = new IntegerDecider();

  it('should grow integer digits only', () => {
    expect(decider.accept('-1,234', EMPTY_SIZE, settings)).toEqual({
      integerDigits: 4,
      fractionalDigits: 0,
      stringLength: 0,
    });
  });

  it('should keep the size object when it already covers the value', () => {
    const size = createSize(5, 0, 5);
    expect(decider.accept('42', size, settings)).toBe(size);
  });

  it('should reject decimals and text', () => {
    expect(decider.accept('1.5', EMPTY_SIZE, settings)).toBeUndefined();
    expect(decider.accept('abc', EMPTY_SIZE, settings)).toBeUndefined();
  });

  it('should leave explicit dates to the date decider', () => {
    const dated = createGuessSettings({ explicitDateFormats: ['yyyyMMdd'] });
    expect(decider.isAcceptable('20240115', dated)).toBe(false);
    expect(decider.isAcceptable('12345', dated)).toBe(true);
  });

  it('should parse with the culture', () => {
    expect(decider.parse('1.234', german)).toBe(1234);
    expect(decider.parse(' -42 ', settings)).toBe(-42);
  });

  it('should throw ParseFailureError for non-integers', () => {
    expect(() => decider.parse('1.5', settings)).toThrow(ParseFailureError);
  });

  it('should claim every integer width', () => {
    expect(decider.scalarKinds).toEqual(['int8', 'int16', 'int32', 'int64']);
    expect(decider.acceptsScalar('float')).toBe(false);
  });

  it('should size scalars with the sign in the length', () => {
    expect(decider.measureScalar(-1234, EMPTY_SIZE)).toEqual({ integerDigits: 4, fractionalDigits: 0, stringLength: 5 });
    expect(decider.measureScalar(12345678901234567890n, EMPTY_SIZE)).toEqual({
      integerDigits: 20,
      fractionalDigits: 0,
      stringLength: 20,
    });
  });

  it('should render at least as wide as its digits', () => {
    expect(decider.renderedLength(createSize(6, 0, 3))).toBe(6);
    expect(decider.renderedLength(createSize(2, 0, 3))).toBe(3);
  });
});

// =============================================================================
// DecimalDecider
// =============================================================================

describe('DecimalDecider', () => {
  const decider = new DecimalDecider();

  it('should grow both digit counts', () => {
    expect(decider.accept('123.4', createSize(1, 3, 0), settings)).toEqual({
      integerDigits: 3,
      fractionalDigits: 3,
      stringLength: 0,
    });
  });

  it('should also accept whole numbers', () => {
    expect(decider.accept('12', EMPTY_SIZE, settings)).toEqual({ integerDigits: 2, fractionalDigits: 0, stringLength: 0 });
  });

  it('should leave explicit dates to the date decider', () => {
    const dated = createGuessSettings({ explicitDatePredicate: text => text.length === 8 });
    expect(decider.isAcceptable('20240115', dated)).toBe(false);
  });

  it('should parse with the culture', () => {
    expect(decider.parse('1,5', german)).toBe(1.5);
    expect(decider.parse('1.5e3', settings)).toBe(1500);
  });

  it('should throw ParseFailureError for text', () => {
    expect(() => decider.parse('one', settings)).toThrow(ParseFailureError);
  });

  it('should size float scalars', () => {
    expect(decider.measureScalar(-12.25, EMPTY_SIZE)).toEqual({ integerDigits: 2, fractionalDigits: 2, stringLength: 6 });
    expect(decider.measureScalar(0.1, EMPTY_SIZE)).toEqual({ integerDigits: 0, fractionalDigits: 1, stringLength: 3 });
  });

  it('should expand exponent renderings of large floats', () => {
    expect(decider.measureScalar(1e21, EMPTY_SIZE)).toEqual({ integerDigits: 22, fractionalDigits: 0, stringLength: 22 });
  });

  it('should keep the size object when it already covers the float', () => {
    const size = createSize(1, 1, 3);
    expect(decider.measureScalar(2.5, size)).toBe(size);
    expect(decider.measureScalar(0, size)).toBe(size);
  });

  it('should still grow when only the sign or extra digits are new', () => {
    expect(decider.measureScalar(-2.5, createSize(1, 1, 3))).toEqual({
      integerDigits: 1,
      fractionalDigits: 1,
      stringLength: 4,
    });
    expect(decider.measureScalar(0.30000000000000004, createSize(1, 2, 4))).toEqual({
      integerDigits: 1,
      fractionalDigits: 17,
      stringLength: 19,
    });
  });

  it('should throw UnsupportedTypeError for floats wider than 38 digits', () => {
    expect(() => decider.measureScalar(1e300, EMPTY_SIZE)).toThrow(UnsupportedTypeError);
    expect(() => decider.measureScalar(1e-300, EMPTY_SIZE)).toThrow(UnsupportedTypeError);
  });

  it('should render digits and point', () => {
    expect(decider.renderedLength(createSize(3, 2, 0))).toBe(6);
    expect(decider.renderedLength(createSize(3, 2, 8))).toBe(8);
  });
});
