/**
 * Type guards and scalar classification
 *
 * Runtime checks that narrow ingested values to the kinds a decider can
 * claim. Classification never converts a value to text.
 */

import { INT16_MAX, INT16_MIN, INT32_MAX, INT32_MIN, INT8_MAX, INT8_MIN } from './constants.js';
import { Duration } from './duration.js';
import { UnsupportedTypeError } from './errors.js';
import type { ScalarKind, ScalarValue } from './types.js';

export function isDuration(value: unknown): value is Duration {
  return value instanceof Duration;
}

/** A Date whose time value is a number (not an Invalid Date) */
export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * Check if a value is a scalar a guesser can ingest without text.
 */
export function isScalarValue(value: unknown): value is ScalarValue {
  switch (typeof value) {
    case 'boolean':
    case 'bigint':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return isValidDate(value) || isDuration(value);
  }
}

function integerKind(value: number): ScalarKind {
  if (value >= INT8_MIN && value <= INT8_MAX) return 'int8';
  if (value >= INT16_MIN && value <= INT16_MAX) return 'int16';
  if (value >= INT32_MIN && value <= INT32_MAX) return 'int32';
  return 'int64';
}

/**
 * Classify a hard-typed value by kind.
 *
 * Whole safe-integer numbers take the narrowest integer kind; any other
 * finite number is a float.
 *
 * @throws UnsupportedTypeError for NaN, Infinity, invalid dates and objects
 */
export function classifyScalar(value: unknown): ScalarKind {
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'bigint':
      return 'int64';
    case 'number':
      if (Number.isSafeInteger(value)) return integerKind(value);
      if (Number.isFinite(value)) return 'float';
      break;
    default:
      if (isValidDate(value)) return 'date';
      if (isDuration(value)) return 'duration';
  }
  throw UnsupportedTypeError.forValue(value);
}
