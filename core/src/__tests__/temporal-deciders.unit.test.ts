/**
 * @coltype/core - DateTime and Duration deciders
 */

import { describe, it, expect } from 'vitest';
import { DE_DE_CULTURE, EN_GB_CULTURE } from '../culture.js';
import { compileDateFormat, matchDateFormats } from '../deciders/date-formats.js';
import { DateTimeDecider, guessDateOrder, readDateTime } from '../deciders/date-time.js';
import { DurationDecider, readDuration } from '../deciders/duration.js';
import { Duration } from '../duration.js';
import { ParseFailureError } from '../errors.js';
import { createGuessSettings } from '../settings.js';
import { EMPTY_SIZE, createSize } from '../size.js';

const settings = createGuessSettings();
const british = createGuessSettings({ culture: EN_GB_CULTURE });
const german = createGuessSettings({ culture: DE_DE_CULTURE });

function utc(text: string, guessSettings = settings): string | undefined {
  return readDateTime(text, guessSettings)?.toISOString();
}

// =============================================================================
// Explicit formats
// =============================================================================

describe('compileDateFormat', () => {
  it('should reuse compilations of the same format', () => {
    expect(compileDateFormat('yyyyMMdd')).toBe(compileDateFormat('yyyyMMdd'));
  });

  it('should read numeric fields', () => {
    expect(compileDateFormat('dd.MM.yyyy HH:mm').match('15.01.2024 10:30', settings.culture)).toEqual({
      year: 2024,
      month: 0,
      day: 15,
      hour: 10,
      minute: 30,
      second: 0,
      millisecond: 0,
    });
  });

  it('should read month names, meridiems and fractions', () => {
    expect(compileDateFormat('dd-MMM-yyyy hh:mm tt').match('15-Jan-2024 03:05 PM', settings.culture)).toMatchObject({
      month: 0,
      hour: 15,
      minute: 5,
    });
    expect(compileDateFormat('yyyyMMddHHmmssfff').match('20240115103000123', settings.culture)).toMatchObject({
      second: 0,
      millisecond: 123,
    });
  });

  it('should treat quoted text as a literal', () => {
    expect(compileDateFormat("yyyy'y'MM").match('2024y03', settings.culture)).toMatchObject({ year: 2024, month: 2 });
  });

  it('should reject impossible dates', () => {
    expect(compileDateFormat('yyyyMMdd').match('20240230', settings.culture)).toBeUndefined();
    expect(compileDateFormat('yyyyMMdd').match('20241301', settings.culture)).toBeUndefined();
  });
});

describe('matchDateFormats', () => {
  it('should use the first format that fits', () => {
    const fields = matchDateFormats('15012024', ['yyyyMMdd', 'ddMMyyyy'], settings.culture);
    expect(fields).toMatchObject({ year: 2024, month: 0, day: 15 });
  });
});

// =============================================================================
// readDateTime
// =============================================================================

describe('readDateTime', () => {
  it('should read ISO 8601 dates and times as UTC', () => {
    expect(utc('2024-01-15')).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('2024-01-15T10:30:00Z')).toBe('2024-01-15T10:30:00.000Z');
    expect(utc('2024-01-15 10:30:00.1234')).toBe('2024-01-15T10:30:00.123Z');
  });

  it('should apply UTC offsets', () => {
    expect(utc('2024-01-15T10:30:00+02:00')).toBe('2024-01-15T08:30:00.000Z');
    expect(utc('2024-01-15T10:30-0130')).toBe('2024-01-15T12:00:00.000Z');
  });

  it('should read numeric dates in the culture order', () => {
    expect(utc('01/02/2024')).toBe('2024-01-02T00:00:00.000Z');
    expect(utc('01/02/2024', british)).toBe('2024-02-01T00:00:00.000Z');
    expect(utc('2024/01/15')).toBe('2024-01-15T00:00:00.000Z');
  });

  it('should reject a month above 12', () => {
    expect(utc('15/01/2024')).toBeUndefined();
    expect(utc('15/01/2024', british)).toBe('2024-01-15T00:00:00.000Z');
  });

  it('should expand two-digit years around the pivot', () => {
    expect(utc('01/02/49')).toBe('2049-01-02T00:00:00.000Z');
    expect(utc('01/02/50')).toBe('1950-01-02T00:00:00.000Z');
  });

  it('should read month names', () => {
    expect(utc('15 Jan 2024')).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('Jan 15, 2024')).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('15-Jan-24')).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('15. Januar 2024', german)).toBe('2024-01-15T00:00:00.000Z');
  });

  it('should read a trailing time with a meridiem', () => {
    expect(utc('1/15/2024 3:45 PM')).toBe('2024-01-15T15:45:00.000Z');
    expect(utc('1/15/2024 12:00 AM')).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('1/15/2024 13:00 PM')).toBeUndefined();
  });

  it('should not read numbers or durations as dates', () => {
    expect(utc('20240115')).toBeUndefined();
    expect(utc('12.5')).toBeUndefined();
    expect(utc('12:30')).toBeUndefined();
  });

  it('should read numbers as dates when an explicit format matches', () => {
    const dated = createGuessSettings({ explicitDateFormats: ['yyyyMMdd'] });
    expect(utc('20240115', dated)).toBe('2024-01-15T00:00:00.000Z');
  });

  it('should read compact dates claimed by an explicit-date predicate', () => {
    const dated = createGuessSettings({ explicitDatePredicate: text => /^\d{8}(\d{4}|\d{6})?$/.test(text) });
    expect(utc('20240115', dated)).toBe('2024-01-15T00:00:00.000Z');
    expect(utc('202401151030', dated)).toBe('2024-01-15T10:30:00.000Z');
  });

  it('should reject invalid calendar dates and plain text', () => {
    expect(utc('2024-02-30')).toBeUndefined();
    expect(utc('hello')).toBeUndefined();
  });
});

describe('guessDateOrder', () => {
  it('should pick day-first when leading components exceed 12', () => {
    expect(guessDateOrder(['13/01/2024', '14/02/2024', '01/02/2024'], settings)).toBe('DMY');
  });

  it('should pick month-first when middle components exceed 12', () => {
    expect(guessDateOrder(['01/13/2024 10:00'], british)).toBe('MDY');
  });

  it('should fall back to the culture order', () => {
    expect(guessDateOrder([], british)).toBe('DMY');
    expect(guessDateOrder(['2024/13/01', 'soon'], settings)).toBe('MDY');
  });
});

describe('DateTimeDecider', () => {
  const decider = new DateTimeDecider();

  it('should widen the length to a full timestamp on accept', () => {
    expect(decider.accept('2024-01-15', EMPTY_SIZE, settings)).toEqual({
      integerDigits: 0,
      fractionalDigits: 0,
      stringLength: 27,
    });
  });

  it('should reject non-dates', () => {
    expect(decider.accept('42', EMPTY_SIZE, settings)).toBeUndefined();
  });

  it('should parse to a UTC Date', () => {
    expect(decider.parse('2024-01-15', settings)).toEqual(new Date(Date.UTC(2024, 0, 15)));
  });

  it('should throw ParseFailureError for non-dates', () => {
    expect(() => decider.parse('soon', settings)).toThrow(ParseFailureError);
  });

  it('should size Date scalars and render at least 27 characters', () => {
    expect(decider.measureScalar(new Date(0), EMPTY_SIZE).stringLength).toBe(27);
    expect(decider.renderedLength(createSize(0, 0, 30))).toBe(30);
    expect(decider.renderedLength(EMPTY_SIZE)).toBe(27);
  });
});

// =============================================================================
// Duration
// =============================================================================

describe('readDuration', () => {
  it('should read clock notation', () => {
    expect(readDuration('01:30')?.totalMilliseconds).toBe(5_400_000);
    expect(readDuration('1.02:03:04.5')?.toString()).toBe('1.02:03:04.500');
    expect(readDuration('-00:15')?.totalMilliseconds).toBe(-900_000);
  });

  it('should reject out-of-range clock fields', () => {
    expect(readDuration('24:00')).toBeUndefined();
    expect(readDuration('12:60')).toBeUndefined();
  });

  it('should read ISO 8601 durations', () => {
    expect(readDuration('PT1H30M')?.totalMilliseconds).toBe(5_400_000);
    expect(readDuration('P1DT2.5S')?.totalMilliseconds).toBe(86_402_500);
    expect(readDuration('P3D')?.days).toBe(3);
  });

  it('should reject ISO designators with no component', () => {
    expect(readDuration('P')).toBeUndefined();
    expect(readDuration('PT')).toBeUndefined();
    expect(readDuration('P1DT')).toBeUndefined();
  });
});

describe('DurationDecider', () => {
  const decider = new DurationDecider();

  it('should accept without touching the size', () => {
    const size = createSize(0, 0, 4);
    expect(decider.accept('00:45', size, settings)).toBe(size);
  });

  it('should parse to a Duration', () => {
    expect(decider.parse('00:45', settings).equals(Duration.fromParts({ minutes: 45 }))).toBe(true);
  });

  it('should size Duration scalars by their rendering', () => {
    expect(decider.measureScalar(Duration.fromParts({ hours: 1 }), EMPTY_SIZE).stringLength).toBe(8);
    expect(decider.measureScalar(Duration.fromParts({ days: 10, milliseconds: 1 }), EMPTY_SIZE).stringLength).toBe(15);
  });
});
