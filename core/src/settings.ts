/**
 * Guess settings: the per-guesser options every decider call receives.
 *
 * Settings are a plain mutable object. A guesser owns its own copy, so a
 * change made between ingestions affects only later acceptance tests, and
 * pooled instances never share one.
 *
 * @module settings
 */

import { INVARIANT_CULTURE, type CultureConfig } from './culture.js';

/**
 * What to do when hard-typed values from different compatibility groups
 * meet on one guesser (for example a Date after a number).
 */
export type HardTypedConflictPolicy = 'throw' | 'fallback';

/** Decides whether a numeric-looking string is really a date */
export type ExplicitDatePredicate = (candidate: string) => boolean;

export interface GuessSettings {
  culture: CultureConfig;
  /** Accept single-character literals such as "Y" and "N" as booleans */
  charCanBeBoolean: boolean;
  /**
   * Date formats (yyyy, MM, dd, HH, mm, ss, fff, tt ...) that mark a string
   * as a date even when it would also read as a number, e.g. `yyyyMMdd`.
   */
  explicitDateFormats: readonly string[] | null;
  /** Replaces the format-based check when set */
  explicitDatePredicate: ExplicitDatePredicate | null;
  /** Added to a string's measured length for each non-ASCII character */
  extraLengthPerNonAsciiCharacter: number;
  hardTypedConflict: HardTypedConflictPolicy;
}

export function createGuessSettings(overrides: Partial<GuessSettings> = {}): GuessSettings {
  return {
    culture: overrides.culture ?? INVARIANT_CULTURE,
    charCanBeBoolean: overrides.charCanBeBoolean ?? false,
    explicitDateFormats: overrides.explicitDateFormats ?? null,
    explicitDatePredicate: overrides.explicitDatePredicate ?? null,
    extraLengthPerNonAsciiCharacter: overrides.extraLengthPerNonAsciiCharacter ?? 0,
    hardTypedConflict: overrides.hardTypedConflict ?? 'throw',
  };
}

/**
 * Copy every field of `from` onto `into` and return `into`.
 */
export function copyGuessSettings(from: GuessSettings, into: GuessSettings): GuessSettings {
  into.culture = from.culture;
  into.charCanBeBoolean = from.charCanBeBoolean;
  into.explicitDateFormats = from.explicitDateFormats === null ? null : [...from.explicitDateFormats];
  into.explicitDatePredicate = from.explicitDatePredicate;
  into.extraLengthPerNonAsciiCharacter = from.extraLengthPerNonAsciiCharacter;
  into.hardTypedConflict = from.hardTypedConflict;
  return into;
}

function formatsEqual(a: readonly string[] | null, b: readonly string[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((format, i) => format === b[i]);
}

export function guessSettingsEqual(a: GuessSettings, b: GuessSettings): boolean {
  return (
    a.culture === b.culture &&
    a.charCanBeBoolean === b.charCanBeBoolean &&
    formatsEqual(a.explicitDateFormats, b.explicitDateFormats) &&
    a.explicitDatePredicate === b.explicitDatePredicate &&
    a.extraLengthPerNonAsciiCharacter === b.extraLengthPerNonAsciiCharacter &&
    a.hardTypedConflict === b.hardTypedConflict
  );
}
