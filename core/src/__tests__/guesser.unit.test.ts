/**
 * @coltype/core - Guesser
 *
 * Covers text ingestion, hard-typed ingestion, the input regime rules,
 * atomic failure, parsing and the change log.
 */

import { describe, it, expect } from 'vitest';
import { DE_DE_CULTURE } from '../culture.js';
import { IntegerDecider } from '../deciders/integer.js';
import { DeciderRegistry } from '../deciders/registry.js';
import { StringDecider } from '../deciders/string.js';
import { Duration } from '../duration.js';
import { ErrorCode, MixedTypingError, ParseFailureError, UnsupportedTypeError, ValidationError } from '../errors.js';
import { Guesser } from '../guesser.js';
import { createTestLogger } from '../logging.js';
import { createSize } from '../size.js';
import { createTypeRequest, describeTypeRequest } from '../type-request.js';
import { TypeTag, type GuessableValue } from '../types.js';

function guessOf(values: GuessableValue[], guesser = new Guesser()): string {
  guesser.adjustToCompensateForValues(values);
  return describeTypeRequest(guesser.guess);
}

function codeOf(run: () => void): string | undefined {
  try {
    run();
  } catch (error) {
    return error instanceof MixedTypingError || error instanceof UnsupportedTypeError ? error.code : 'other';
  }
  return undefined;
}

// =============================================================================
// Text values
// =============================================================================

describe('Guesser with text values', () => {
  it('should start as an empty String', () => {
    const guesser = new Guesser();
    expect(guesser.guess).toEqual({
      type: TypeTag.String,
      size: { integerDigits: 0, fractionalDigits: 0, stringLength: 0 },
      unicode: false,
    });
    expect(guesser.inputRegime).toBe('unset');
  });

  it('should infer Integer for whole numbers', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(['1', '2', '3']);

    expect(guesser.guess.type).toBe(TypeTag.Integer);
    expect(guesser.guess.size.integerDigits).toBe(1);
    expect(guesser.inputRegime).toBe('string');
  });

  it('should widen Integer to Decimal', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(['1', '2.5', '3']);

    expect(guesser.guess.type).toBe(TypeTag.Decimal);
    expect(guesser.guess.size).toEqual({ integerDigits: 1, fractionalDigits: 1, stringLength: 3 });
  });

  it('should reach the same estimate in either order', () => {
    expect(guessOf(['2.5', '1', '3'])).toBe(guessOf(['1', '2.5', '3']));
    expect(guessOf(['1', '2.5', '300'])).toBe('Decimal(4,1)');
  });

  it('should fall back to String wide enough for every earlier value', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(['true', 'false', '7']);

    expect(guesser.guess.type).toBe(TypeTag.String);
    expect(guesser.guess.size.stringLength).toBe(5);
  });

  it('should never leave String once reached', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(['abc', '12345']);

    expect(describeTypeRequest(guesser.guess)).toBe('String(5)');
  });

  it('should size String by the longest text once reached, not by digit counts', () => {
    expect(guessOf(['abc', '12345', '0.123456'])).toBe('String(8)');
    expect(guessOf(['abc', '0.123456', '12345'])).toBe('String(8)');
  });

  it('should fall back to String for numbers wider than 38 digits', () => {
    expect(guessOf(['1e300'])).toBe('String(5)');
    expect(guessOf(['1e-300'])).toBe('String(6)');
    expect(guessOf(['1e37'])).toBe('Decimal(38,0)');
  });

  it('should keep the full date width when a date column falls back', () => {
    expect(guessOf(['2024-01-15', '42'])).toBe('String(27)');
    expect(guessOf(['2024-01-15', '01:30'])).toBe('String(27)');
  });

  it('should infer DateTime and Duration', () => {
    const dates = new Guesser();
    dates.adjustToCompensateForValues(['2024-01-15', '2024-02-01T10:30:00Z']);
    expect(dates.guess.type).toBe(TypeTag.DateTime);
    expect(dates.guess.size.stringLength).toBe(27);

    const durations = new Guesser();
    durations.adjustToCompensateForValues(['01:30', '00:45:10']);
    expect(durations.guess.type).toBe(TypeTag.Duration);
    expect(durations.guess.size.stringLength).toBe(8);
  });

  it('should read compact numbers as dates only with an explicit format', () => {
    expect(new Guesser().settings.explicitDateFormats).toBeNull();
    expect(guessOf(['20240115', '20231231'])).toBe('Integer(8)');

    const dated = new Guesser({ settings: { explicitDateFormats: ['yyyyMMdd'] } });
    dated.adjustToCompensateForValues(['20240115', '20231231']);
    expect(dated.guess.type).toBe(TypeTag.DateTime);
  });

  it('should read numbers with the configured culture', () => {
    const guesser = new Guesser({ settings: { culture: DE_DE_CULTURE } });
    expect(guessOf(['1.234,5', '7'], guesser)).toBe('Decimal(5,1)');
  });

  it('should count null, undefined and blank strings without changing the estimate', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('12');
    const before = guesser.guess;

    guesser.adjustToCompensateForValues([null, undefined, '', '   ']);

    expect(guesser.guess).toBe(before);
    expect(guesser.stats).toEqual({ valueCount: 1, nullCount: 4 });
  });

  it('should flag non-ASCII text and add the configured extra length', () => {
    const plain = new Guesser();
    plain.adjustToCompensateForValue('héllo');
    expect(plain.guess).toMatchObject({ type: TypeTag.String, unicode: true });
    expect(plain.guess.size.stringLength).toBe(5);

    const padded = new Guesser({ settings: { extraLengthPerNonAsciiCharacter: 2 } });
    padded.adjustToCompensateForValue('héllo');
    expect(padded.guess.size.stringLength).toBe(7);
  });

  it('should apply settings changed between ingestions to later values', () => {
    const guesser = new Guesser();
    guesser.settings.charCanBeBoolean = true;
    guesser.adjustToCompensateForValues(['Y', 'N']);

    expect(guesser.guess.type).toBe(TypeTag.Boolean);
    expect(guessOf(['Y', 'N'])).toBe('String(1)');
  });
});

// =============================================================================
// Hard-typed values
// =============================================================================

describe('Guesser with hard-typed values', () => {
  it('should size numbers by their digits', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues([1, 2.5, 300]);

    expect(describeTypeRequest(guesser.guess)).toBe('Decimal(4,1)');
    expect(guesser.isPrimedWithHardType).toBe(true);
  });

  it('should take bigints as integers', () => {
    expect(guessOf([12345678901234567890n])).toBe('Integer(20)');
  });

  it('should take booleans, Dates and Durations', () => {
    expect(guessOf([true, false])).toBe('Boolean');
    expect(guessOf([new Date(0)])).toBe('DateTime');
    expect(guessOf([Duration.fromParts({ hours: 1 })])).toBe('Duration');
  });

  it('should reject text after hard-typed values and keep the estimate', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue(1);
    const before = guesser.guess;

    expect(codeOf(() => guesser.adjustToCompensateForValue('2'))).toBe(
      ErrorCode.MIXED_TYPING_STRING_AFTER_HARD_TYPED
    );
    expect(guesser.guess).toBe(before);
    expect(guesser.guess).toMatchObject({ type: TypeTag.Integer, size: { integerDigits: 1 } });
    expect(guesser.stats.valueCount).toBe(1);
  });

  it('should name the rejected value and the current type', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue(1);

    expect(() => guesser.adjustToCompensateForValue('2')).toThrow(
      "Cannot process string value '2' after processing hard-typed Integer values"
    );
  });

  it('should accept blank text after hard-typed values as null', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues([1, ' ']);
    expect(guesser.stats).toEqual({ valueCount: 1, nullCount: 1 });
  });

  it('should reject each hard-typed family after text with its own code', () => {
    const primed = (): Guesser => {
      const guesser = new Guesser();
      guesser.adjustToCompensateForValue('1');
      return guesser;
    };

    expect(codeOf(() => primed().adjustToCompensateForValue(5))).toBe(ErrorCode.MIXED_TYPING_INTEGER_AFTER_STRING);
    expect(codeOf(() => primed().adjustToCompensateForValue(5n))).toBe(ErrorCode.MIXED_TYPING_INTEGER_AFTER_STRING);
    expect(codeOf(() => primed().adjustToCompensateForValue(2.5))).toBe(ErrorCode.MIXED_TYPING_DECIMAL_AFTER_STRING);
    expect(codeOf(() => primed().adjustToCompensateForValue(true))).toBe(ErrorCode.MIXED_TYPING_BOOLEAN_AFTER_STRING);
    expect(codeOf(() => primed().adjustToCompensateForValue(new Date(0)))).toBe(ErrorCode.MIXED_TYPING);
  });

  it('should reject values no decider claims', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('1');

    for (const value of [Number.NaN, Number.POSITIVE_INFINITY, new Date('not a date')]) {
      expect(codeOf(() => guesser.adjustToCompensateForValue(value))).toBe(ErrorCode.UNSUPPORTED_TYPE);
    }
    expect(guesser.stats.valueCount).toBe(1);
  });

  it('should throw on incompatible hard-typed families by default', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue(true);
    const before = guesser.guess;

    expect(codeOf(() => guesser.adjustToCompensateForValue(42))).toBe(
      ErrorCode.MIXED_TYPING_INCOMPATIBLE_HARD_TYPES
    );
    expect(guesser.guess).toBe(before);
  });

  it('should fall back to String when the conflict policy allows it', () => {
    const guesser = new Guesser({ settings: { hardTypedConflict: 'fallback' } });
    guesser.adjustToCompensateForValues([true, 42]);
    expect(describeTypeRequest(guesser.guess)).toBe('String(5)');

    guesser.adjustToCompensateForValue(new Date(0));
    expect(describeTypeRequest(guesser.guess)).toBe('String(27)');
    expect(guesser.inputRegime).toBe('hard-typed');
  });

  it('should size later hard-typed values on their own once String', () => {
    const guesser = new Guesser({ settings: { hardTypedConflict: 'fallback' } });
    guesser.adjustToCompensateForValues([true, 12345, 0.123456]);
    expect(describeTypeRequest(guesser.guess)).toBe('String(8)');
  });

  it('should reject floats wider than 38 digits and stay unchanged', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue(2.5);
    const before = guesser.guess;

    expect(codeOf(() => guesser.adjustToCompensateForValue(1e300))).toBe(ErrorCode.UNSUPPORTED_TYPE);
    expect(guesser.guess).toBe(before);
    expect(guesser.stats.valueCount).toBe(1);
  });

  it('should keep values ingested before a failing one in a batch', () => {
    const guesser = new Guesser();

    expect(() => guesser.adjustToCompensateForValues(['1', '22', 3, '4444'])).toThrow(MixedTypingError);
    expect(describeTypeRequest(guesser.guess)).toBe('Integer(2)');
    expect(guesser.stats.valueCount).toBe(2);
  });
});

describe('Guesser.adjustToCompensateForValues', () => {
  it('should accept any iterable of values', () => {
    expect(guessOf([])).toBe('String(0)');

    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(new Set(['1', '22']));
    expect(describeTypeRequest(guesser.guess)).toBe('Integer(2)');
  });

  it('should refuse a bare string instead of reading its characters', () => {
    const guesser = new Guesser();

    expect(() => Reflect.apply(guesser.adjustToCompensateForValues, guesser, ['123'])).toThrow(ValidationError);
    expect(guesser.stats.valueCount).toBe(0);
  });
});

describe('Guesser with an initial type', () => {
  it('should start from the given estimate without locking a regime', () => {
    const guesser = new Guesser({ initialType: createTypeRequest(TypeTag.Integer, createSize(3, 0, 3)) });

    expect(describeTypeRequest(guesser.guess)).toBe('Integer(3)');
    expect(guesser.inputRegime).toBe('unset');
    expect(guesser.stats.valueCount).toBe(0);
  });

  it('should widen from the initial estimate', () => {
    const guesser = new Guesser({ initialType: createTypeRequest(TypeTag.Integer, createSize(3, 0, 3)) });
    guesser.adjustToCompensateForValue('2.5');
    expect(describeTypeRequest(guesser.guess)).toBe('Decimal(4,1)');

    const hardTyped = new Guesser({ initialType: createTypeRequest(TypeTag.Integer, createSize(3, 0, 3)) });
    hardTyped.adjustToCompensateForValue(7);
    expect(describeTypeRequest(hardTyped.guess)).toBe('Integer(3)');
  });

  it('should stay String when started as String', () => {
    const guesser = new Guesser({ initialType: createTypeRequest(TypeTag.String, createSize(0, 0, 10), true) });
    guesser.adjustToCompensateForValue('12345');
    expect(describeTypeRequest(guesser.guess)).toBe('String(10) unicode');
  });

  it('should drop the initial estimate on reset', () => {
    const guesser = new Guesser({ initialType: createTypeRequest(TypeTag.Boolean, createSize(0, 0, 5)) });
    guesser.reset();
    expect(guesser.guess).toEqual(createTypeRequest(TypeTag.String));
  });

  it('should throw UnsupportedTypeError for a type the registry lacks', () => {
    const registry = new DeciderRegistry([new StringDecider(), new IntegerDecider()]);
    expect(() => new Guesser({ registry, initialType: createTypeRequest(TypeTag.Duration) })).toThrow(
      UnsupportedTypeError
    );
  });
});

// =============================================================================
// Reading
// =============================================================================

describe('Guesser.guess', () => {
  it('should return the same frozen object until the estimate changes', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('1');
    const first = guesser.guess;

    guesser.adjustToCompensateForValue('1');
    expect(guesser.guess).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);

    guesser.adjustToCompensateForValue('12');
    expect(guesser.guess).not.toBe(first);
    expect(first.size.integerDigits).toBe(1);
  });
});

describe('Guesser.parse', () => {
  it('should parse with the current estimate', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValues(['1', '2.5']);

    expect(guesser.parse('2.5')).toBe(2.5);
    expect(guesser.parse('1')).toBe(1);
  });

  it('should parse dates to UTC Dates', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('2024-01-15');
    expect(guesser.parse('2024-01-15')).toEqual(new Date(Date.UTC(2024, 0, 15)));
  });

  it('should parse blanks to null and leave text alone while String', () => {
    const guesser = new Guesser();
    expect(guesser.parse('   ')).toBeNull();
    expect(guesser.parse('abc')).toBe('abc');

    guesser.adjustToCompensateForValue('abc');
    expect(guesser.parse(' x ')).toBe(' x ');
  });

  it('should throw ParseFailureError for text the estimate cannot read', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('1');
    expect(() => guesser.parse('x')).toThrow(ParseFailureError);
  });
});

describe('Guesser.shouldDowngradeColumnType', () => {
  it('should suggest a downgrade only for String columns holding narrower values', () => {
    const guesser = new Guesser();
    guesser.adjustToCompensateForValue('12');

    expect(guesser.shouldDowngradeColumnType(TypeTag.String)).toBe(true);
    expect(guesser.shouldDowngradeColumnType(TypeTag.Integer)).toBe(false);

    guesser.adjustToCompensateForValue('twelve');
    expect(guesser.shouldDowngradeColumnType(TypeTag.String)).toBe(false);
  });
});

describe('Guesser.reset', () => {
  it('should return to the empty state and keep settings', () => {
    const guesser = new Guesser({ settings: { charCanBeBoolean: true } });
    guesser.adjustToCompensateForValues([7, null]);

    guesser.reset();

    expect(guesser.guess.type).toBe(TypeTag.String);
    expect(guesser.stats).toEqual({ valueCount: 0, nullCount: 0 });
    expect(guesser.inputRegime).toBe('unset');
    expect(guesser.settings.charCanBeBoolean).toBe(true);

    guesser.adjustToCompensateForValue('Y');
    expect(guesser.guess.type).toBe(TypeTag.Boolean);
  });
});

// =============================================================================
// Logging
// =============================================================================

describe('Guesser logging', () => {
  it('should log each change of estimate at debug level', () => {
    const logger = createTestLogger();
    const guesser = new Guesser({ logger });

    guesser.adjustToCompensateForValues(['1', '2', '2.5', 'x']);

    const logs = logger.getLogsByLevel('debug');
    expect(logs.map(entry => entry.message)).toEqual([
      'Type estimate changed',
      'Type estimate changed',
      'Type estimate changed',
    ]);
    expect(logs.map(entry => entry.context)).toEqual([
      { from: null, to: 'Integer', reason: 'adopt', valueCount: 1 },
      { from: 'Integer', to: 'Decimal', reason: 'widen', valueCount: 3 },
      { from: 'Decimal', to: 'String', reason: 'fallback', valueCount: 4 },
    ]);
  });

  it('should not log failed ingestions', () => {
    const logger = createTestLogger();
    const guesser = new Guesser({ logger });
    guesser.adjustToCompensateForValue(1);
    logger.clear();

    expect(() => guesser.adjustToCompensateForValue('1')).toThrow(MixedTypingError);
    expect(logger.getLogs()).toEqual([]);
  });
});
