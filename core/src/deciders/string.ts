import type { GuessSettings } from '../settings.js';
import type { Size } from '../size.js';
import { CompatibilityGroup, TypeTag } from '../types.js';
import { BaseDecider } from './decider.js';

/**
 * Universal fallback: accepts every string as it is. Length is measured by
 * the guesser, which knows the non-ASCII weighting in force.
 */
export class StringDecider extends BaseDecider<string> {
  constructor() {
    super(TypeTag.String, CompatibilityGroup.Textual, ['string']);
  }

  override accept(_candidate: string, size: Size, _settings?: GuessSettings): Size {
    return size;
  }

  override isAcceptable(_candidate?: string, _settings?: GuessSettings): boolean {
    return true;
  }

  override parse(candidate: string, _settings?: GuessSettings): string {
    return candidate;
  }

  protected override acceptTrimmed(_text: string, size: Size): Size {
    return size;
  }

  protected override parseTrimmed(text: string): string {
    return text;
  }

  override measureScalar(_value: unknown, size: Size): Size {
    return size;
  }
}
