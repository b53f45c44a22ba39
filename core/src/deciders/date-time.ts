import { MIN_DATE_STRING_LENGTH } from '../constants.js';
import { monthIndex, type DateOrder } from '../culture.js';
import { ParseFailureError } from '../errors.js';
import type { GuessSettings } from '../settings.js';
import { growLength, type Size } from '../size.js';
import { CompatibilityGroup, TypeTag, type ScalarValue } from '../types.js';
import {
  applyMeridiem,
  expandTwoDigitYear,
  fractionToMilliseconds,
  matchDateFormats,
  toUtcDate,
  type DateFields,
} from './date-formats.js';
import { BaseDecider, isExplicitDate } from './decider.js';
import { readDuration } from './duration.js';
import { isDecimalText } from './numeric.js';

// =============================================================================
// Patterns
// =============================================================================

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

const TRAILING_TIME = /[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,7}))?)?(?:\s*([AaPp][Mm]))?$/;

// 15/01/2024, 01-15-24, 2024.01.15
const NUMERIC_DATE = /^(\d{1,4})([/\-.\\])(\d{1,2})\2(\d{1,4})$/;

// 15 Jan 2024, 15-Jan-24, 15. Januar 2024
const DAY_MONTH_NAME_YEAR = /^(\d{1,2})\.?[-\s]\s*(\p{L}+\.?)[-\s,]\s*(\d{4}|\d{2})$/u;

// Jan 15, 2024
const MONTH_NAME_DAY_YEAR = /^(\p{L}+\.?)\s+(\d{1,2}),?\s+(\d{4}|\d{2})$/u;

/** Tried when an explicit-date predicate claims a string no format covers */
const COMPACT_FORMATS: readonly string[] = ['yyyyMMdd', 'yyyyMMddHHmm', 'yyyyMMddHHmmss'];

// =============================================================================
// Reading
// =============================================================================

function emptyFields(): DateFields {
  return { year: 1970, month: 0, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 };
}

function parseOffsetMinutes(offset: string): number {
  if (offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  return sign * (hours * 60 + minutes);
}

function readIso(text: string): Date | undefined {
  const m = ISO_8601.exec(text);
  if (!m) return undefined;

  const date = toUtcDate({
    year: Number(m[1]),
    month: Number(m[2]) - 1,
    day: Number(m[3]),
    hour: m[4] === undefined ? 0 : Number(m[4]),
    minute: m[5] === undefined ? 0 : Number(m[5]),
    second: m[6] === undefined ? 0 : Number(m[6]),
    millisecond: m[7] === undefined ? 0 : fractionToMilliseconds(m[7]),
  });
  if (!date || m[8] === undefined) return date;
  return new Date(date.getTime() - parseOffsetMinutes(m[8]) * 60_000);
}

function readYear(digits: string): number | undefined {
  if (digits.length === 4) return Number(digits);
  if (digits.length === 2) return expandTwoDigitYear(Number(digits));
  return undefined;
}

function readDatePart(text: string, fields: DateFields, settings: GuessSettings): boolean {
  const numeric = NUMERIC_DATE.exec(text);
  if (numeric) {
    const [, a, , b, c] = numeric;
    let year: number | undefined;
    let month: number;
    let day: number;

    if (a.length === 4 || settings.culture.dateOrder === 'YMD') {
      year = readYear(a);
      month = Number(b);
      day = Number(c);
      if (c.length > 2) return false;
    } else if (settings.culture.dateOrder === 'DMY') {
      day = Number(a);
      month = Number(b);
      year = readYear(c);
    } else {
      month = Number(a);
      day = Number(b);
      year = readYear(c);
    }

    if (year === undefined || a.length === 3) return false;
    fields.year = year;
    fields.month = month - 1;
    fields.day = day;
    return true;
  }

  const dayFirst = DAY_MONTH_NAME_YEAR.exec(text);
  const monthFirst = dayFirst ? undefined : MONTH_NAME_DAY_YEAR.exec(text);
  const dayToken = dayFirst ? dayFirst[1] : monthFirst?.[2];
  const monthToken = dayFirst ? dayFirst[2] : monthFirst?.[1];
  const yearToken = dayFirst ? dayFirst[3] : monthFirst?.[3];
  if (dayToken === undefined || monthToken === undefined || yearToken === undefined) return false;

  const month = monthIndex(settings.culture, monthToken);
  const year = readYear(yearToken);
  if (month < 0 || year === undefined) return false;

  fields.year = year;
  fields.month = month;
  fields.day = Number(dayToken);
  return true;
}

/**
 * Read a date or date-time. Text that reads as a number or as a duration is
 * not a date unless it is configured as an explicit date.
 */
export function readDateTime(text: string, settings: GuessSettings): Date | undefined {
  const { culture } = settings;

  if (settings.explicitDateFormats && settings.explicitDateFormats.length > 0) {
    const fields = matchDateFormats(text, settings.explicitDateFormats, culture);
    if (fields) return toUtcDate(fields);
  }

  const explicit = isExplicitDate(text, settings);
  if (explicit) {
    const fields = matchDateFormats(text, COMPACT_FORMATS, culture);
    if (fields) return toUtcDate(fields);
  } else if (isDecimalText(text, culture) || readDuration(text) !== undefined) {
    return undefined;
  }

  const iso = readIso(text);
  if (iso) return iso;

  const fields = emptyFields();
  let datePart = text;
  const time = TRAILING_TIME.exec(text);
  if (time) {
    const pm = time[5] === undefined ? undefined : time[5].toLowerCase() === 'pm';
    const hour = applyMeridiem(Number(time[1]), pm);
    if (hour === undefined) return undefined;
    fields.hour = hour;
    fields.minute = Number(time[2]);
    fields.second = time[3] === undefined ? 0 : Number(time[3]);
    fields.millisecond = time[4] === undefined ? 0 : fractionToMilliseconds(time[4]);
    datePart = text.slice(0, time.index).trim();
  }

  if (!readDatePart(datePart, fields, settings)) return undefined;
  return toUtcDate(fields);
}

/**
 * Choose day-first or month-first reading from sample data. A leading
 * component above 12 can only be a day; so can a middle one.
 * Falls back to the culture's own order when the samples do not tell.
 */
export function guessDateOrder(samples: Iterable<string>, settings: GuessSettings): DateOrder {
  let dayFirst = 0;
  let monthFirst = 0;

  for (const sample of samples) {
    const text = sample.trim();
    const time = TRAILING_TIME.exec(text);
    const m = NUMERIC_DATE.exec(time ? text.slice(0, time.index).trim() : text);
    if (!m || m[1].length > 2) continue;
    if (Number(m[1]) > 12) dayFirst++;
    if (Number(m[3]) > 12) monthFirst++;
  }

  if (dayFirst > monthFirst) return 'DMY';
  if (monthFirst > dayFirst) return 'MDY';
  return settings.culture.dateOrder;
}

// =============================================================================
// Decider
// =============================================================================

/**
 * Dates and date-times, read as UTC. Any accepted value widens the column's
 * text length to the minimum date width so a later fallback to String can
 * hold a fully rendered timestamp.
 */
export class DateTimeDecider extends BaseDecider<Date> {
  constructor() {
    super(TypeTag.DateTime, CompatibilityGroup.Temporal, ['date']);
  }

  protected override acceptTrimmed(text: string, size: Size, settings: GuessSettings): Size | undefined {
    return readDateTime(text, settings) === undefined ? undefined : growLength(size, MIN_DATE_STRING_LENGTH);
  }

  protected override parseTrimmed(text: string, settings: GuessSettings): Date {
    const date = readDateTime(text, settings);
    if (!date) throw ParseFailureError.forValue(text, this.typeTag);
    return date;
  }

  override measureScalar(_value: ScalarValue, size: Size): Size {
    return growLength(size, MIN_DATE_STRING_LENGTH);
  }

  override renderedLength(size: Size): number {
    return Math.max(size.stringLength, MIN_DATE_STRING_LENGTH);
  }
}
