/**
 * Explicit date format compilation.
 *
 * Formats use the familiar custom tokens (`yyyy`, `MM`, `dd`, `HH`, `mm`,
 * `ss`, `fff`, `tt` and friends). Each format is compiled once into an
 * anchored RegExp plus the list of fields its capture groups fill.
 */

import { TWO_DIGIT_YEAR_PIVOT } from '../constants.js';
import { monthIndex, type CultureConfig } from '../culture.js';

// =============================================================================
// Types
// =============================================================================

type DateField =
  | 'year4'
  | 'year2'
  | 'monthName'
  | 'month'
  | 'day'
  | 'hour24'
  | 'hour12'
  | 'minute'
  | 'second'
  | 'fraction'
  | 'meridiem';

/** Calendar fields read from a string; month is 0-based */
export interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export interface CompiledDateFormat {
  readonly format: string;
  /** Read `text` as this format, or undefined when it does not fit */
  match(text: string, culture: CultureConfig): DateFields | undefined;
}

// =============================================================================
// Tokenizer
// =============================================================================

interface TokenRule {
  token: string;
  pattern: string;
  field: DateField;
}

// Longest tokens first so `MMMM` wins over `MM`
const TOKEN_RULES: readonly TokenRule[] = [
  { token: 'yyyy', pattern: '(\\d{4})', field: 'year4' },
  { token: 'yy', pattern: '(\\d{2})', field: 'year2' },
  { token: 'MMMM', pattern: '(\\p{L}+)', field: 'monthName' },
  { token: 'MMM', pattern: '(\\p{L}+\\.?)', field: 'monthName' },
  { token: 'MM', pattern: '(\\d{2})', field: 'month' },
  { token: 'M', pattern: '(\\d{1,2})', field: 'month' },
  { token: 'dd', pattern: '(\\d{2})', field: 'day' },
  { token: 'd', pattern: '(\\d{1,2})', field: 'day' },
  { token: 'HH', pattern: '(\\d{2})', field: 'hour24' },
  { token: 'H', pattern: '(\\d{1,2})', field: 'hour24' },
  { token: 'hh', pattern: '(\\d{2})', field: 'hour12' },
  { token: 'h', pattern: '(\\d{1,2})', field: 'hour12' },
  { token: 'mm', pattern: '(\\d{2})', field: 'minute' },
  { token: 'm', pattern: '(\\d{1,2})', field: 'minute' },
  { token: 'ss', pattern: '(\\d{2})', field: 'second' },
  { token: 's', pattern: '(\\d{1,2})', field: 'second' },
  { token: 'tt', pattern: '([AaPp][Mm])', field: 'meridiem' },
];

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function compile(format: string): CompiledDateFormat {
  let source = '';
  const fields: DateField[] = [];
  let i = 0;

  while (i < format.length) {
    // fractional seconds: any run of f
    if (format[i] === 'f') {
      let run = 0;
      while (format[i + run] === 'f') run++;
      source += `(\\d{${run}})`;
      fields.push('fraction');
      i += run;
      continue;
    }

    // quoted literal
    if (format[i] === "'") {
      const end = format.indexOf("'", i + 1);
      const literal = end === -1 ? format.slice(i + 1) : format.slice(i + 1, end);
      source += escapeRegExp(literal);
      i = end === -1 ? format.length : end + 1;
      continue;
    }

    const rule = TOKEN_RULES.find(r => format.startsWith(r.token, i));
    if (rule) {
      source += rule.pattern;
      fields.push(rule.field);
      i += rule.token.length;
    } else {
      source += escapeRegExp(format.charAt(i));
      i++;
    }
  }

  const regex = new RegExp(`^${source}$`, 'u');

  return {
    format,
    match(text: string, culture: CultureConfig): DateFields | undefined {
      const m = regex.exec(text);
      if (!m) return undefined;

      const out: DateFields = { year: 1970, month: 0, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 };
      let hour12: number | undefined;
      let pm: boolean | undefined;

      for (let g = 0; g < fields.length; g++) {
        const raw = m[g + 1];
        if (raw === undefined) return undefined;
        switch (fields[g]) {
          case 'year4':
            out.year = Number(raw);
            break;
          case 'year2':
            out.year = expandTwoDigitYear(Number(raw));
            break;
          case 'monthName': {
            const index = monthIndex(culture, raw);
            if (index < 0) return undefined;
            out.month = index;
            break;
          }
          case 'month':
            out.month = Number(raw) - 1;
            break;
          case 'day':
            out.day = Number(raw);
            break;
          case 'hour24':
            out.hour = Number(raw);
            break;
          case 'hour12':
            hour12 = Number(raw);
            break;
          case 'minute':
            out.minute = Number(raw);
            break;
          case 'second':
            out.second = Number(raw);
            break;
          case 'fraction':
            out.millisecond = fractionToMilliseconds(raw);
            break;
          case 'meridiem':
            pm = raw.toLowerCase() === 'pm';
            break;
        }
      }

      if (hour12 !== undefined) {
        const hour = applyMeridiem(hour12, pm);
        if (hour === undefined) return undefined;
        out.hour = hour;
      }

      return toUtcDate(out) ? out : undefined;
    },
  };
}

// =============================================================================
// Field helpers
// =============================================================================

export function expandTwoDigitYear(year: number): number {
  return year < TWO_DIGIT_YEAR_PIVOT ? 2000 + year : 1900 + year;
}

/** Digits after the seconds' decimal point, truncated to milliseconds */
export function fractionToMilliseconds(digits: string): number {
  return Number(digits.slice(0, 3).padEnd(3, '0'));
}

/**
 * Convert a 12-hour clock reading to 0-23. Without a meridiem the hour is
 * taken as written.
 */
export function applyMeridiem(hour: number, pm: boolean | undefined): number | undefined {
  if (pm === undefined) return hour;
  if (hour < 1 || hour > 12) return undefined;
  if (pm) return hour === 12 ? 12 : hour + 12;
  return hour === 12 ? 0 : hour;
}

/**
 * Build the UTC instant for `fields`, or undefined when any field is out of
 * range (31 February, hour 25 ...).
 */
export function toUtcDate(fields: DateFields): Date | undefined {
  const { year, month, day, hour, minute, second, millisecond } = fields;
  if (month < 0 || month > 11 || day < 1 || day > 31) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, millisecond);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

// =============================================================================
// Cache
// =============================================================================

const compiled = new Map<string, CompiledDateFormat>();

/**
 * Compile a format, reusing an earlier compilation of the same string.
 */
export function compileDateFormat(format: string): CompiledDateFormat {
  let entry = compiled.get(format);
  if (!entry) {
    entry = compile(format);
    compiled.set(format, entry);
  }
  return entry;
}

/**
 * Read `text` with the first of `formats` that fits.
 */
export function matchDateFormats(
  text: string,
  formats: readonly string[],
  culture: CultureConfig
): DateFields | undefined {
  for (const format of formats) {
    const fields = compileDateFormat(format).match(text, culture);
    if (fields) return fields;
  }
  return undefined;
}
