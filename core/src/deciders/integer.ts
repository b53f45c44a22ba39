import { ParseFailureError } from '../errors.js';
import type { GuessSettings } from '../settings.js';
import { growLength, growNumeric, type Size } from '../size.js';
import { CompatibilityGroup, TypeTag, type ScalarValue } from '../types.js';
import { BaseDecider, isExplicitDate } from './decider.js';
import { countDigits, readInteger } from './numeric.js';

/**
 * Whole numbers in the safe-integer range, with optional sign and culture
 * group separators ("1,234" in the invariant culture, "1.234" in de-DE).
 *
 * Strings configured as explicit dates are left for the DateTime decider.
 */
export class IntegerDecider extends BaseDecider<number> {
  constructor() {
    super(TypeTag.Integer, CompatibilityGroup.Numerical, ['int8', 'int16', 'int32', 'int64']);
  }

  protected override acceptTrimmed(text: string, size: Size, settings: GuessSettings): Size | undefined {
    const reading = readInteger(text, settings.culture);
    if (!reading || isExplicitDate(text, settings)) return undefined;
    return growNumeric(size, reading.integerDigits, 0);
  }

  protected override parseTrimmed(text: string, settings: GuessSettings): number {
    const reading = readInteger(text, settings.culture);
    if (!reading) throw ParseFailureError.forValue(text, this.typeTag);
    return reading.value;
  }

  override measureScalar(value: ScalarValue, size: Size): Size {
    if (typeof value !== 'number' && typeof value !== 'bigint') return size;
    const digits = countDigits(value);
    const negative = value < 0;
    return growLength(growNumeric(size, digits, 0), negative ? digits + 1 : digits);
  }

  override renderedLength(size: Size): number {
    return Math.max(size.stringLength, size.integerDigits);
  }
}
