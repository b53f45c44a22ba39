import { BOOLEAN_STRING_LENGTH } from '../constants.js';
import type { GuessSettings } from '../settings.js';
import { growLength, type Size } from '../size.js';
import { CompatibilityGroup, TypeTag } from '../types.js';
import { BaseDecider } from './decider.js';

const DIGITS = /^[+-]?\d+$/;

/**
 * Accepts the culture's true/false words, and single characters such as
 * "Y"/"N" when `charCanBeBoolean` is set. Digit tokens are never booleans.
 */
export class BooleanDecider extends BaseDecider<boolean> {
  constructor() {
    super(TypeTag.Boolean, CompatibilityGroup.Boolean, ['boolean']);
  }

  protected override acceptTrimmed(text: string, size: Size, settings: GuessSettings): Size | undefined {
    return readBoolean(text, settings) === undefined ? undefined : size;
  }

  protected override parseTrimmed(text: string, settings: GuessSettings): boolean {
    return readBoolean(text, settings) === true;
  }

  override measureScalar(_value: unknown, size: Size): Size {
    return growLength(size, BOOLEAN_STRING_LENGTH);
  }

  override renderedLength(size: Size): number {
    return Math.max(size.stringLength, BOOLEAN_STRING_LENGTH);
  }
}

function readBoolean(text: string, settings: GuessSettings): boolean | undefined {
  if (DIGITS.test(text)) return undefined;

  const lower = text.toLowerCase();
  const { culture } = settings;

  if (lower.length === 1) {
    if (!settings.charCanBeBoolean) return undefined;
    if (culture.charTrueLiterals.includes(lower)) return true;
    if (culture.charFalseLiterals.includes(lower)) return false;
    return undefined;
  }

  if (culture.trueLiterals.includes(lower)) return true;
  if (culture.falseLiterals.includes(lower)) return false;
  return undefined;
}
