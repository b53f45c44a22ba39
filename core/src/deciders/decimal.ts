import { MAX_DECIMAL_DIGITS } from '../constants.js';
import { INVARIANT_CULTURE } from '../culture.js';
import { ParseFailureError, UnsupportedTypeError } from '../errors.js';
import type { GuessSettings } from '../settings.js';
import { decimalStringLength, growLength, growNumeric, type Size } from '../size.js';
import { CompatibilityGroup, TypeTag, type ScalarValue } from '../types.js';
import { BaseDecider, isExplicitDate } from './decider.js';
import { readDecimal } from './numeric.js';

// Powers of ten up to 1e22 are exact doubles
const MAX_EXACT_POWER_OF_TEN = 22;

/**
 * True when `size` already holds `value`, checked without rendering it.
 * A value has at most f fractional digits exactly when rounding it to f
 * places gives the same double back.
 */
function coversFloat(value: number, size: Size): boolean {
  const { integerDigits, fractionalDigits, stringLength } = size;
  if (integerDigits > MAX_EXACT_POWER_OF_TEN || fractionalDigits > MAX_EXACT_POWER_OF_TEN) return false;

  const magnitude = Math.abs(value);
  if (magnitude >= 10 ** integerDigits) return false;
  const scale = 10 ** fractionalDigits;
  const scaled = Math.round(magnitude * scale);
  if (!Number.isSafeInteger(scaled) || scaled / scale !== magnitude) return false;

  const widest =
    (value < 0 ? 1 : 0) + Math.max(1, integerDigits) + (fractionalDigits > 0 ? fractionalDigits + 1 : 0);
  return stringLength >= widest;
}

/**
 * Fixed-point and exponent numbers. Size is measured after the exponent is
 * applied, so "1.5e3" needs four integer digits and "1e-3" three fractional.
 */
export class DecimalDecider extends BaseDecider<number> {
  constructor() {
    super(TypeTag.Decimal, CompatibilityGroup.Numerical, ['float']);
  }

  protected override acceptTrimmed(text: string, size: Size, settings: GuessSettings): Size | undefined {
    const reading = readDecimal(text, settings.culture);
    if (!reading || isExplicitDate(text, settings)) return undefined;
    return growNumeric(size, reading.integerDigits, reading.fractionalDigits);
  }

  protected override parseTrimmed(text: string, settings: GuessSettings): number {
    const reading = readDecimal(text, settings.culture);
    if (!reading) throw ParseFailureError.forValue(text, this.typeTag);
    return reading.value;
  }

  override measureScalar(value: ScalarValue, size: Size): Size {
    if (typeof value !== 'number' || coversFloat(value, size)) return size;
    // String() may use exponent notation, which readDecimal expands
    const reading = readDecimal(String(Math.abs(value)), INVARIANT_CULTURE);
    if (!reading) throw UnsupportedTypeError.forOversizedDecimal(value, MAX_DECIMAL_DIGITS);

    const { integerDigits, fractionalDigits } = reading;
    const length =
      (value < 0 ? 1 : 0) + Math.max(1, integerDigits) + (fractionalDigits > 0 ? fractionalDigits + 1 : 0);
    return growLength(growNumeric(size, integerDigits, fractionalDigits), length);
  }

  override renderedLength(size: Size): number {
    return Math.max(size.stringLength, decimalStringLength(size));
  }
}
